/**
 * codebuilder
 *
 * Programmatic construction of source text with automatic indentation and
 * line breaks.
 */

export {
    CodeBuilder,
    Variable,
    variable,
    classifyValue,
    putExtended,
    UnsupportedValueKindError
} from './classes';

export type {
    CodeFunc,
    CodeValue,
    Content,
    Parameter,
    CodeBuilderOptions,
    DispatchOptions,
    DispatchedValue
} from './types/CodeBuilder.type';
