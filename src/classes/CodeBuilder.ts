/**
 * CodeBuilder - stateful text emission for generated source code
 *
 * Keeps an array of output chunks (joined on read), the current indentation
 * depth, and two suspend counters that switch off automatic indentation and
 * automatic line breaks while a single logical token is written across
 * several calls.
 */

import { format } from 'node:util';
import type {
    CodeBuilderOptions,
    CodeFunc,
    CodeValue,
    Content,
    DispatchOptions,
    Parameter
} from '../types/CodeBuilder.type';
import type { Variable } from './Variable';
import { putExtended } from './ValueDispatcher';
import {
    emitImport,
    emitVariable,
    emitAlias,
    emitEnumValue,
    emitReturn,
    emitFuncDeclaration,
    emitFuncCall
} from './emitters';
import { readDebugFlag, debugLog } from '../utils';

const COUNTER_MAX = Number.MAX_SAFE_INTEGER;

export class CodeBuilder {
    /**
     * Debug mode flag - set to true to log counter saturation
     * Initialised from the VITE_DEBUG environment variable
     */
    static debug: boolean = readDebugFlag();

    private parts: string[] = [];
    private tabs: number = 0;
    private disableTabCount: number = 0;
    private disableLinesCount: number = 0;
    private readonly indentString: string;
    private readonly newline: string;

    constructor(options: CodeBuilderOptions = {}) {
        this.indentString = options.indentString ?? '\t';
        this.newline = options.newline ?? '\n';
    }

    get indentDepth(): number {
        return this.tabs;
    }

    get indentSuspendCount(): number {
        return this.disableTabCount;
    }

    get lineSuspendCount(): number {
        return this.disableLinesCount;
    }

    /**
     * Write content, with indentation before and a line break after unless
     * either is turned off by the arguments or a suspend counter.
     *
     * A chunk sequence gets the policy applied to every chunk.
     */
    put(content: Content, autoIndent: boolean = true, autoNewline: boolean = true): this {
        if (this.disableTabCount > 0) {
            autoIndent = false;
        }
        if (this.disableLinesCount > 0) {
            autoNewline = false;
        }

        const indent = autoIndent ? this.indentString.repeat(this.tabs) : '';
        const lineEnd = autoNewline ? this.newline : '';
        const chunks = typeof content === 'string' ? [content] : content;

        for (const chunk of chunks) {
            this.parts.push(indent + chunk + lineEnd);
        }
        return this;
    }

    entab(): this {
        if (this.tabs === COUNTER_MAX) {
            this.log('entab', 'indent depth already at maximum');
            return this;
        }
        this.tabs += 1;
        return this;
    }

    detab(): this {
        if (this.tabs === 0) {
            this.log('detab', 'indent depth already at zero');
            return this;
        }
        this.tabs -= 1;
        return this;
    }

    /**
     * Suspend automatic indentation and/or line breaks. Each call must be
     * matched by an enable() with the same flags.
     */
    disable(suppressIndent: boolean = true, suppressNewline: boolean = true): this {
        if (suppressNewline) {
            if (this.disableLinesCount === COUNTER_MAX) {
                this.log('disable', 'line suspend count already at maximum');
            } else {
                this.disableLinesCount += 1;
            }
        }
        if (suppressIndent) {
            if (this.disableTabCount === COUNTER_MAX) {
                this.log('disable', 'indent suspend count already at maximum');
            } else {
                this.disableTabCount += 1;
            }
        }
        return this;
    }

    enable(suppressIndent: boolean = true, suppressNewline: boolean = true): this {
        if (suppressNewline) {
            if (this.disableLinesCount === 0) {
                this.log('enable', 'line suspend count already at zero');
            } else {
                this.disableLinesCount -= 1;
            }
        }
        if (suppressIndent) {
            if (this.disableTabCount === 0) {
                this.log('enable', 'indent suspend count already at zero');
            } else {
                this.disableTabCount -= 1;
            }
        }
        return this;
    }

    /**
     * Get the text written so far
     */
    data(): string {
        return this.parts.join('');
    }

    toString(): string {
        return this.data();
    }

    /**
     * Clear all content and reset indentation and suspend counters
     */
    clear(): this {
        this.parts = [];
        this.tabs = 0;
        this.disableTabCount = 0;
        this.disableLinesCount = 0;
        return this;
    }

    /**
     * Run body one indentation level deeper
     */
    withIndent(body: CodeFunc): this {
        this.entab();
        try {
            body(this);
        } finally {
            this.detab();
        }
        return this;
    }

    /**
     * Write a braced block with body indented inside it
     */
    withScope(body: CodeFunc): this {
        this.put('{');
        this.withIndent(body);
        return this.put('}');
    }

    /**
     * Run body with the chosen auto-formatting suspended; the counters are
     * released even if body throws.
     */
    suspended(body: CodeFunc, suppressIndent: boolean = true, suppressNewline: boolean = true): this {
        this.disable(suppressIndent, suppressNewline);
        try {
            body(this);
        } finally {
            this.enable(suppressIndent, suppressNewline);
        }
        return this;
    }

    /**
     * Write content between double quotes, as one token
     */
    putQuoted(content: Content): this {
        return this.suspended(b => {
            b.put('"');
            b.put(content);
            b.put('"');
        });
    }

    /**
     * Write util.format(template, ...args) with default formatting
     *
     * Uses node:util, so the bundle runs on Node.js only; browser builds
     * would need node:util aliased to a polyfill.
     */
    putFormatted(template: string, ...args: unknown[]): this {
        return this.put(format(template, ...args));
    }

    /**
     * Write any supported value through the Value Dispatcher
     *
     * @throws UnsupportedValueKindError
     */
    putExtended(value: CodeValue, options?: DispatchOptions): this {
        putExtended(this, value, options);
        return this;
    }

    addImport(moduleName: string, selection?: readonly string[] | null): this {
        emitImport(this, moduleName, selection);
        return this;
    }

    addVariable(typeName: string, name: string, initializer?: CodeValue): Variable {
        return emitVariable(this, typeName, name, initializer);
    }

    addAlias(name: string, initializer?: CodeValue): Variable {
        return emitAlias(this, name, initializer);
    }

    addEnumValue(name: string, initializer?: CodeValue): Variable {
        return emitEnumValue(this, name, initializer);
    }

    /**
     * Write `return <value>;`, or `return;` without a value
     */
    addReturn(value?: CodeValue): this {
        emitReturn(this, value);
        return this;
    }

    addFuncDeclaration(returnType: string, name: string, parameters: readonly Parameter[], body: CodeFunc): this {
        emitFuncDeclaration(this, returnType, name, parameters, body);
        return this;
    }

    /**
     * Write a call statement: `<name>(<args>);`
     */
    addFuncCall(name: string, ...args: CodeValue[]): this {
        emitFuncCall(this, name, args, true);
        return this;
    }

    /**
     * Write a call expression with no trailing `;` or line break, for use
     * inside another argument list or initializer
     */
    putFuncCall(name: string, ...args: CodeValue[]): this {
        emitFuncCall(this, name, args, false);
        return this;
    }

    private log(method: string, message: string): void {
        if (CodeBuilder.debug) {
            debugLog(`CodeBuilder.${method}`, message);
        }
    }
}
