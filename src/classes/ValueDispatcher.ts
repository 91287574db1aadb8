/**
 * Value Dispatcher - the single place where caller-supplied values become text
 *
 * Every emitter that accepts a value (call arguments, return values,
 * initializers) goes through putExtended(), so formatting rules live here.
 */

import type { CodeBuilder } from './CodeBuilder';
import type { CodeValue, DispatchedValue, DispatchOptions } from '../types/CodeBuilder.type';
import { Variable } from './Variable';
import { UnsupportedValueKindError } from './exceptions';
import { describeValueKind, isTextSequence, primitiveToText } from '../utils';

/**
 * Resolve a value into its dispatch variant
 *
 * @throws UnsupportedValueKindError when the value has no variant
 */
export function classifyValue(value: unknown): DispatchedValue {
    if (typeof value === 'string' || isTextSequence(value)) {
        return { kind: 'text', text: value };
    }
    if (typeof value === 'function') {
        return {
            kind: 'code',
            func: (builder: CodeBuilder) => {
                value(builder);
            }
        };
    }
    if (value instanceof Variable) {
        return { kind: 'variable', variable: value };
    }
    if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') {
        return { kind: 'primitive', text: primitiveToText(value) };
    }
    throw new UnsupportedValueKindError(describeValueKind(value));
}

/**
 * Write a value's canonical text representation into the builder
 */
export function putExtended(builder: CodeBuilder, value: CodeValue, options: DispatchOptions = {}): CodeBuilder {
    const dispatched = classifyValue(value);

    switch (dispatched.kind) {
        case 'text':
            return options.quoteText
                ? builder.putQuoted(dispatched.text)
                : builder.put(dispatched.text);
        case 'code':
            dispatched.func(builder);
            return builder;
        case 'variable':
            return builder.put(dispatched.variable.name);
        case 'primitive':
            return builder.put(dispatched.text);
    }
}
