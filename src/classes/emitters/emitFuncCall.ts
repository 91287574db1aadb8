/**
 * Emit a function call
 */

import type { CodeBuilder } from '../CodeBuilder';
import type { CodeValue } from '../../types/CodeBuilder.type';

/**
 * Write `<name>(<arg>, ...)`, optionally terminated by `;` and a newline.
 *
 * Arguments go through the Value Dispatcher one by one; text arguments are
 * written as string literals.
 */
export function emitFuncCall(
    builder: CodeBuilder,
    name: string,
    args: readonly CodeValue[],
    emitTrailingSemicolon: boolean = true
): CodeBuilder {
    // The name is never indented; callers position the call themselves
    builder.put(name, false, false);

    builder.suspended(b => {
        b.put('(');
        args.forEach((arg, i) => {
            if (i > 0) {
                b.put(', ');
            }
            b.putExtended(arg, { quoteText: true });
        });
        b.put(')');
    });

    if (emitTrailingSemicolon) {
        builder.put(';', false);
    }
    return builder;
}
