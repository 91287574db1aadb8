/**
 * Exception classes for code emission
 */

/**
 * Thrown when the Value Dispatcher receives a value it cannot write
 */
export class UnsupportedValueKindError extends Error {
    kind: string;
    constructor(kind: string) {
        super(`Unsupported value kind: ${kind}`);
        this.kind = kind;
        this.name = 'UnsupportedValueKindError';
    }
}
