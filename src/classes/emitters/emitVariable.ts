/**
 * Emit variable, alias and enum declarations
 */

import type { CodeBuilder } from '../CodeBuilder';
import type { CodeValue } from '../../types/CodeBuilder.type';
import { Variable } from '../Variable';

/**
 * Write `<typeName> <name>[ = <initializer>];` and return a reference to it
 */
export function emitVariable(builder: CodeBuilder, typeName: string, name: string, initializer?: CodeValue): Variable {
    builder.put(`${typeName} ${name}`, true, false);

    if (initializer !== undefined) {
        const value = initializer;
        builder.suspended(b => {
            b.put(' = ');
            b.putExtended(value);
        });
    }

    builder.put(';', false);
    return new Variable(typeName, name, initializer);
}

export function emitAlias(builder: CodeBuilder, name: string, initializer?: CodeValue): Variable {
    return emitVariable(builder, 'alias', name, initializer);
}

export function emitEnumValue(builder: CodeBuilder, name: string, initializer?: CodeValue): Variable {
    return emitVariable(builder, 'enum', name, initializer);
}
