import type { CodeValue } from '../types/CodeBuilder.type';

/**
 * Reference to a declared variable, alias or enum value.
 *
 * Only `name` is written when the reference is passed as a value; there is
 * no connection back to the builder that declared it.
 */
export class Variable {
    readonly typeName: string;
    readonly name: string;
    readonly initializer?: CodeValue;

    constructor(typeName: string, name: string, initializer?: CodeValue) {
        this.typeName = typeName;
        this.name = name;
        this.initializer = initializer;
        Object.freeze(this);
    }
}

/**
 * Shorthand for new Variable(...)
 */
export function variable(typeName: string, name: string, initializer?: CodeValue): Variable {
    return new Variable(typeName, name, initializer);
}
