// src/program.ts
import fs from 'fs';
import { StructuralError } from './errors.js';
import { CharCode, Op, OpType, opMap } from './types.js';

interface Scanned {
    type: OpType;
    line: number;
    column: number;
}

/**
 * Scan source text into instructions, pairing brackets on the way.
 * An unmatched bracket keeps a `null` partner; `Program.validate` reports it.
 */
const create_program = (source: string): Op[] => {
    const scanned: Scanned[] = [];
    const partners: (number | null)[] = [];
    const bracketStack: number[] = [];
    const chars = Array.from(source);
    let line = 1;
    let column = 1;

    for (let i = 0; i < chars.length; i++) {
        const c = chars[i].codePointAt(0) ?? 0;
        if (c === CharCode.LF) {
            line++;
            column = 1;
            continue;
        }
        if (c === CharCode.CR && chars[i + 1] === '\n') {
            continue;
        }

        const opType = opMap.get(c);
        if (opType !== undefined) {
            const index = scanned.length;
            scanned.push({ type: opType, line, column });
            partners.push(null);

            if (opType === OpType.OPEN) {
                bracketStack.push(index);
            } else if (opType === OpType.CLOSE) {
                const openPos = bracketStack.pop();
                if (openPos !== undefined) {
                    partners[openPos] = index;
                    partners[index] = openPos;
                }
            }
        }
        column++;
    }

    return scanned.map((s, i) => new Op(s.type, s.line, s.column, partners[i]));
};

export class Program {
    readonly instructions: readonly Op[];

    /** @param name identifies the program in diagnostics only */
    constructor(public readonly name: string, source: string) {
        this.instructions = Object.freeze(create_program(source));
    }

    static fromFile(path: string): Program {
        return new Program(path, fs.readFileSync(path, 'utf8'));
    }

    get length(): number {
        return this.instructions.length;
    }

    /** Throws a `StructuralError` for the first loop instruction left unpaired. */
    validate(): this {
        const unresolved = this.instructions.find(op => op.isLoop && op.partner === null);
        if (unresolved) {
            throw StructuralError.unresolved(this.name, unresolved);
        }
        return this;
    }

    listing(): string[] {
        return this.instructions.map(op => `${this.name}: ${op}`);
    }
}
