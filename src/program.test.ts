import fc from 'fast-check';
import { fileURLToPath } from 'url';
import { describe, expect, it } from 'vitest';
import { StructuralError } from './errors.js';
import { Program } from './program.js';
import { OpType } from './types.js';

const fixture = (name: string): string => fileURLToPath(new URL(`../bf/${name}`, import.meta.url));

const thrown = (fn: () => unknown): unknown => {
    try {
        fn();
    } catch (err) {
        return err;
    }
    return undefined;
};

const { program: balanced } = fc.letrec(tie => ({
    program: fc.array(tie('item'), { maxLength: 5 }).map(items => items.join('')),
    item: fc.oneof(
        { depthSize: 'small', maxDepth: 4 },
        fc.constantFrom('+', '-', '<', '>', '.', ',', ' ', '\n', 'x'),
        tie('loop')
    ),
    loop: tie('program').map(body => `[${String(body)}]`),
}));

describe('Program parsing', () => {
    it('keeps only the eight commands and records their positions', () => {
        const program = new Program('', 'test001++  hello --');
        expect(program.instructions.map(op => [op.type, op.position.line, op.position.column])).toEqual([
            [OpType.ADD, 1, 8],
            [OpType.ADD, 1, 9],
            [OpType.SUB, 1, 18],
            [OpType.SUB, 1, 19],
        ]);
    });

    it('tracks lines across LF and CRLF terminators', () => {
        const program = new Program('', '+\n  -\r\n>');
        expect(program.instructions.map(op => op.position)).toEqual([
            { line: 1, column: 1 },
            { line: 2, column: 3 },
            { line: 3, column: 1 },
        ]);
    });

    it('counts columns in code points', () => {
        const program = new Program('', '\u{1F600}é+');
        expect(program.instructions[0].position).toEqual({ line: 1, column: 3 });
    });

    it('pairs nested brackets by index', () => {
        const program = new Program('', '[[]]');
        expect(program.instructions.map(op => op.partner)).toEqual([3, 2, 1, 0]);
    });

    it('leaves non-loop instructions without a partner', () => {
        const program = new Program('', '+[-]');
        expect(program.instructions[0].partner).toBeNull();
        expect(program.instructions[2].partner).toBeNull();
    });

    it('freezes the instruction sequence', () => {
        const program = new Program('', '+-');
        expect(Object.isFrozen(program.instructions)).toBe(true);
        expect(Object.isFrozen(program.instructions[0].position)).toBe(true);
    });

    it('renders a listing line per instruction', () => {
        expect(new Program('x.bf', '+\n.').listing()).toEqual([
            'x.bf: 1:1 Increment current data',
            'x.bf: 2:1 Print out current data',
        ]);
    });
});

describe('Program.validate', () => {
    it('returns the program when every bracket is paired', () => {
        const program = new Program('', '+[>[-]<-]');
        expect(program.validate()).toBe(program);
    });

    it('reports an unmatched open bracket with its position', () => {
        const program = new Program('t.bf', 'test001++  hello --[>,<+>--,[]');
        const err = thrown(() => program.validate());
        expect(err).toBeInstanceOf(StructuralError);
        expect(err).toMatchObject({ kind: 'unmatched-open', position: { line: 1, column: 20 } });
        expect(err).toHaveProperty(
            'message',
            'Error in input file t.bf: no close bracket matches the open bracket at line 1 column 20'
        );
    });

    it('reports the first unresolved instruction in sequence order', () => {
        const err = thrown(() => new Program('t.bf', '+]\n[').validate());
        expect(err).toMatchObject({ kind: 'unmatched-close', position: { line: 1, column: 2 } });
        expect(err).toHaveProperty(
            'message',
            'Error in input file t.bf: no open bracket matches the close bracket at line 1 column 2'
        );
    });

    it('pairs every bracket symmetrically in balanced source', () => {
        fc.assert(
            fc.property(balanced, source => {
                const program = new Program('p', source).validate();
                program.instructions.forEach((op, i) => {
                    if (!op.isLoop) return;
                    expect(op.partner).not.toBeNull();
                    const partner = program.instructions[op.partner ?? -1];
                    expect(partner.type).toBe(op.type === OpType.OPEN ? OpType.CLOSE : OpType.OPEN);
                    expect(partner.partner).toBe(i);
                });
            })
        );
    });

    it('cites a trailing unmatched open bracket', () => {
        fc.assert(
            fc.property(balanced, source => {
                const program = new Program('p', `${source}[`);
                const last = program.instructions[program.length - 1];
                const err = thrown(() => program.validate());
                expect(err).toBeInstanceOf(StructuralError);
                expect(err).toMatchObject({ kind: 'unmatched-open', position: last.position });
            })
        );
    });

    it('cites a leading unmatched close bracket', () => {
        fc.assert(
            fc.property(balanced, source => {
                const err = thrown(() => new Program('p', `]${source}`).validate());
                expect(err).toBeInstanceOf(StructuralError);
                expect(err).toMatchObject({ kind: 'unmatched-close', position: { line: 1, column: 1 } });
            })
        );
    });
});

describe('Program.fromFile', () => {
    it('uses the path as the program name', () => {
        const path = fixture('hello.bf');
        const program = Program.fromFile(path).validate();
        expect(program.name).toBe(path);
        expect(program.instructions[0].position).toEqual({ line: 2, column: 1 });
    });

    it('keeps unbalanced files for validate to reject', () => {
        const program = Program.fromFile(fixture('unbalanced.bf'));
        expect(() => program.validate()).toThrowError(StructuralError);
    });
});
