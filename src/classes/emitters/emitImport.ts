/**
 * Emit an import declaration
 */

import type { CodeBuilder } from '../CodeBuilder';

export function emitImport(builder: CodeBuilder, moduleName: string, selection?: readonly string[] | null): CodeBuilder {
    builder.put(`import ${moduleName}`, true, false);

    // An empty selection still writes the ' : ' clause
    if (selection !== undefined && selection !== null) {
        const symbols = selection.join(', ');
        builder.suspended(b => {
            b.put(' : ');
            b.put(symbols);
        });
    }

    return builder.put(';', false);
}
