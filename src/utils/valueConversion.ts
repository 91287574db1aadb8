/**
 * Value conversion and type checking utilities for the Value Dispatcher
 */

/**
 * Convert a primitive scalar to its canonical source text
 *
 * NaN and the infinities come out as `NaN`, `Infinity` and `-Infinity`.
 */
export function primitiveToText(val: number | bigint | boolean): string {
    if (typeof val === 'boolean') {
        return val ? 'true' : 'false';
    }
    if (Object.is(val, -0)) {
        return '-0';
    }
    return val.toString();
}

/**
 * Check whether a value is a sequence of text chunks
 */
export function isTextSequence(val: unknown): val is readonly string[] {
    // Array.from turns holes into undefined so sparse arrays are rejected
    return Array.isArray(val) && Array.from(val).every(item => typeof item === 'string');
}

/**
 * Describe the shape of a value for error messages
 */
export function describeValueKind(val: unknown): string {
    if (val === null) {
        return 'null';
    }
    if (Array.isArray(val)) {
        return 'array';
    }
    if (typeof val === 'object') {
        const ctorName = Object.getPrototypeOf(val)?.constructor?.name;
        return typeof ctorName === 'string' && ctorName !== 'Object' ? ctorName : 'object';
    }
    return typeof val;
}
