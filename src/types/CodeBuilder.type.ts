/**
 * Shared types for the code builder
 */

import type { CodeBuilder } from '../classes/CodeBuilder';
import type { Variable } from '../classes/Variable';

/**
 * Deferred code generation: receives the builder and writes into it.
 * Whatever it returns is ignored, so chained calls like
 * `b => b.addReturn('6')` are fine.
 */
export type CodeFunc = (builder: CodeBuilder) => void;

/**
 * Any value the Value Dispatcher knows how to write
 */
export type CodeValue =
    | string
    | readonly string[]
    | CodeFunc
    | Variable
    | number
    | bigint
    | boolean;

/**
 * Text accepted by put(): a single chunk or pre-split chunks
 */
export type Content = string | readonly string[];

/**
 * A function parameter. Variable instances satisfy this shape too.
 */
export interface Parameter {
    readonly typeName: string;
    readonly name: string;
}

export interface CodeBuilderOptions {
    indentString?: string; // Defaults to a single tab
    newline?: string;      // Defaults to '\n'
}

export interface DispatchOptions {
    quoteText?: boolean; // Render text values as string literals
}

/**
 * Result of classifying a value for emission
 */
export type DispatchedValue =
    | { kind: 'text'; text: Content }
    | { kind: 'code'; func: CodeFunc }
    | { kind: 'variable'; variable: Variable }
    | { kind: 'primitive'; text: string };
