/**
 * Emit a function declaration with a braced body
 */

import type { CodeBuilder } from '../CodeBuilder';
import type { CodeFunc, Parameter } from '../../types/CodeBuilder.type';

/**
 * Write `<returnType> <name>(<type> <name>, ...)` followed by the body scope
 *
 * @param parameters - Ordered parameters; an empty list gives `()`
 * @param body - Writes the statements inside the braces, one level deeper
 */
export function emitFuncDeclaration(
    builder: CodeBuilder,
    returnType: string,
    name: string,
    parameters: readonly Parameter[],
    body: CodeFunc
): CodeBuilder {
    builder.put(`${returnType} ${name}`, true, false);

    builder.suspended(b => {
        b.put('(');
        b.put(parameters.map(param => `${param.typeName} ${param.name}`).join(', '));
    });
    builder.put(')', false);

    return builder.withScope(body);
}
