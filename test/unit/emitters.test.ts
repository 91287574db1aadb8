import { describe, expect, it } from 'vitest';

import { CodeBuilder, Variable, variable } from '../../src';
import type { CodeFunc } from '../../src';

describe('addImport', () => {
    it('imports a whole module', () => {
        const builder = new CodeBuilder();
        builder.addImport('std.stdio');
        expect(builder.data()).toBe('import std.stdio;\n');
    });

    it('imports selected symbols', () => {
        const builder = new CodeBuilder();
        builder.addImport('std.stdio', ['readln', 'writeln']);
        expect(builder.data()).toBe('import std.stdio : readln, writeln;\n');
    });

    it('keeps the selection clause for an empty list', () => {
        const builder = new CodeBuilder();
        builder.addImport('std.stdio', []);
        expect(builder.data()).toBe('import std.stdio : ;\n');
    });

    it('treats null like a missing selection', () => {
        const builder = new CodeBuilder();
        builder.addImport('std.stdio', null);
        expect(builder.data()).toBe('import std.stdio;\n');
    });

    it('indents the statement once', () => {
        const builder = new CodeBuilder();
        builder.withIndent(b => b.addImport('std.conv', ['to']));
        expect(builder.data()).toBe('\timport std.conv : to;\n');
    });
});

describe('addVariable', () => {
    it('declares without an initializer', () => {
        const builder = new CodeBuilder();
        const six = builder.addVariable('int', 'six');
        expect(builder.data()).toBe('int six;\n');
        expect(six).toBeInstanceOf(Variable);
        expect(six.typeName).toBe('int');
        expect(six.name).toBe('six');
        expect(six.initializer).toBeUndefined();
    });

    it('declares with a callback initializer and keeps it on the reference', () => {
        const builder = new CodeBuilder();
        const init: CodeFunc = b => b.put('6');
        const six = builder.addVariable('int', 'six', init);
        expect(builder.data()).toBe('int six = 6;\n');
        expect(six.initializer).toBe(init);
        expect(Object.isFrozen(six)).toBe(true);
    });

    it('writes text and primitive initializers through the dispatcher', () => {
        const builder = new CodeBuilder();
        builder.addVariable('int', 'total', 'a + b');
        builder.addVariable('double', 'ratio', 0.5);
        builder.addVariable('bool', 'done', false);
        expect(builder.data()).toBe('int total = a + b;\ndouble ratio = 0.5;\nbool done = false;\n');
    });

    it('accepts another variable as initializer', () => {
        const builder = new CodeBuilder();
        const first = builder.addVariable('int', 'first', 1);
        builder.addVariable('int', 'second', first);
        expect(builder.data()).toBe('int first = 1;\nint second = first;\n');
    });

    it('writes alias and enum declarations', () => {
        const builder = new CodeBuilder();
        const num = builder.addAlias('Number', 'int');
        const max = builder.addEnumValue('max', 10);
        expect(builder.data()).toBe('alias Number = int;\nenum max = 10;\n');
        expect(num.typeName).toBe('alias');
        expect(max.typeName).toBe('enum');
    });
});

describe('addReturn', () => {
    it('writes text verbatim', () => {
        const builder = new CodeBuilder();
        builder.addReturn('21 * 8');
        expect(builder.data()).toBe('return 21 * 8;\n');
    });

    it('writes a variable by name', () => {
        const builder = new CodeBuilder();
        builder.addReturn(variable('int', 'someNumber'));
        expect(builder.data()).toBe('return someNumber;\n');
    });

    it('lets a callback write the expression', () => {
        const builder = new CodeBuilder();
        builder.addReturn(b => b.put('200 / someNumber'));
        expect(builder.data()).toBe('return 200 / someNumber;\n');
    });

    it('writes a bare return without a value', () => {
        const builder = new CodeBuilder();
        builder.withIndent(b => b.addReturn());
        expect(builder.data()).toBe('\treturn;\n');
    });
});

describe('addFuncDeclaration', () => {
    it('writes the signature and an indented body', () => {
        const builder = new CodeBuilder();
        builder.addFuncDeclaration('int', 'sum', [variable('int', 'a'), variable('int', 'b')], b => b.addReturn('a + b'));
        expect(builder.data()).toBe('int sum(int a, int b)\n{\n\treturn a + b;\n}\n');
    });

    it('writes empty parentheses without parameters', () => {
        const builder = new CodeBuilder();
        builder.addFuncDeclaration('int', 'six', [], b => b.addReturn('6'));
        expect(builder.data()).toBe('int six()\n{\n\treturn 6;\n}\n');
    });

    it('accepts plain parameter records and nests declarations', () => {
        const builder = new CodeBuilder();
        builder.addFuncDeclaration('void', 'outer', [{ typeName: 'string', name: 's' }], b => {
            b.addFuncDeclaration('int', 'inner', [], ib => ib.addReturn(1));
        });
        expect(builder.data()).toBe(
            'void outer(string s)\n{\n\tint inner()\n\t{\n\t\treturn 1;\n\t}\n}\n'
        );
    });
});

describe('addFuncCall', () => {
    it('dispatches heterogeneous arguments', () => {
        const builder = new CodeBuilder();
        builder.addFuncCall('writeln', 'Hello', b => b.putQuoted('World!'), variable('int', 'someVar'));
        expect(builder.data()).toBe('writeln("Hello", "World!", someVar);\n');
    });

    it('writes empty parentheses without arguments', () => {
        const builder = new CodeBuilder();
        builder.addFuncCall('flush');
        expect(builder.data()).toBe('flush();\n');
    });

    it('nests a call expression as an argument', () => {
        const builder = new CodeBuilder();
        builder.addFuncCall('writeln', b => b.putFuncCall('sum', 20, 80), true);
        expect(builder.data()).toBe('writeln(sum(20, 80), true);\n');
    });

    it('omits the semicolon and line break for a call expression', () => {
        const builder = new CodeBuilder();
        builder.putFuncCall('sum', 1, 2);
        expect(builder.data()).toBe('sum(1, 2)');
    });

    it('does not indent the call name', () => {
        const builder = new CodeBuilder();
        builder.withIndent(b => b.addFuncCall('writeln', 'hi'));
        expect(builder.data()).toBe('writeln("hi");\n');
    });

    it('leaves positioning a call inside a body to the caller', () => {
        const builder = new CodeBuilder();
        builder.addFuncDeclaration('void', 'main', [], b => {
            b.put('', true, false);
            b.addFuncCall('writeln', 'hi');
        });
        expect(builder.data()).toBe('void main()\n{\n\twriteln("hi");\n}\n');
    });
});
