// src/errors.ts
import { OpType } from './types.js';
import type { Op, SourcePosition } from './types.js';

/** Base class of every failure raised while validating or running a program. */
export class VMError extends Error {
    readonly position: SourcePosition;

    constructor(message: string, public readonly op: Op, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
        this.position = op.position;
    }
}

export type StructuralErrorKind = 'unmatched-open' | 'unmatched-close';

/** A loop instruction without a resolved partner. */
export class StructuralError extends VMError {
    readonly kind: StructuralErrorKind;

    constructor(op: Op, message = `Unmatched square bracket by ${op}`) {
        super(message, op);
        this.kind = op.type === OpType.OPEN ? 'unmatched-open' : 'unmatched-close';
    }

    static unresolved(programName: string, op: Op): StructuralError {
        const { line, column } = op.position;
        const detail = op.type === OpType.OPEN
            ? 'no close bracket matches the open bracket'
            : 'no open bracket matches the close bracket';
        return new StructuralError(
            op,
            `Error in input file ${programName}: ${detail} at line ${line} column ${column}`
        );
    }
}

/** The head tried to leave the tape. */
export class BoundsError extends VMError {
    constructor(op: Op, public readonly head: number, public readonly tapeLength: number) {
        super(`Head falling off edge by ${op}`, op);
    }
}

/** The input or output channel failed to transfer a byte. */
export class TapeIOError extends VMError {
    constructor(op: Op, cause: unknown) {
        super(`${cause instanceof Error ? cause.message : String(cause)} by ${op}`, op, { cause });
    }
}
