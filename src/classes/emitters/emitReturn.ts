/**
 * Emit a return statement
 */

import type { CodeBuilder } from '../CodeBuilder';
import type { CodeValue } from '../../types/CodeBuilder.type';

export function emitReturn(builder: CodeBuilder, value?: CodeValue): CodeBuilder {
    if (value === undefined) {
        return builder.put('return;');
    }

    const returned = value;
    builder.put('return ', true, false);
    builder.suspended(b => {
        b.putExtended(returned);
    });
    return builder.put(';', false);
}
