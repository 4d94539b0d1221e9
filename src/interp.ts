// src/interp.ts
import { byteCell } from './cell.js';
import type { Cell, CellFactory } from './cell.js';
import { BoundsError, StructuralError, TapeIOError } from './errors.js';
import { FdReader, FdWriter } from './io.js';
import type { ByteReader, ByteWriter } from './io.js';
import { Program } from './program.js';
import { Tape } from './tape.js';
import { CharCode, DEFAULT_CELLS, OpType } from './types.js';
import type { Op } from './types.js';

export interface MachineOptions {
    /** Initial tape length; 0 or absent selects `DEFAULT_CELLS`. */
    cells?: number;
    /** Let the tape grow when the head moves past its last cell. */
    extensible?: boolean;
    cell?: CellFactory;
    /** Receives `<line>:<column> <action>` before each instruction runs. */
    trace?: (line: string) => void;
}

/**
 * Runs a validated `Program` against a tape of cells. The program is only
 * read; tape, head and cursor belong to the machine and are rebuilt on
 * every `run`.
 */
export class VirtualMachine {
    private tape: Tape;
    private cc = 0;
    private pc = 0;
    private tail = 0;
    private readonly initialCells: number;
    private readonly extensible: boolean;
    private readonly newCell: CellFactory;
    private readonly trace?: (line: string) => void;

    constructor(private readonly program: Program, options: MachineOptions = {}) {
        this.initialCells = options.cells || DEFAULT_CELLS;
        this.extensible = options.extensible ?? false;
        this.newCell = options.cell ?? byteCell;
        this.trace = options.trace;
        this.tape = new Tape(this.initialCells, this.newCell);
    }

    get head(): number {
        return this.cc;
    }

    get cursor(): number {
        return this.pc;
    }

    get tapeLength(): number {
        return this.tape.length;
    }

    cellAt(index: number): number {
        return this.tape.at(index).get();
    }

    private get current(): Op {
        const op = this.program.instructions[this.pc];
        if (op === undefined) {
            throw new RangeError(`No instruction at ${this.pc} in ${this.program.name}`);
        }
        return op;
    }

    private get cell(): Cell {
        return this.tape.at(this.cc);
    }

    moveRight(): void {
        if (this.cc >= this.tape.length - 1) {
            if (!this.extensible) {
                throw new BoundsError(this.current, this.cc, this.tape.length);
            }
            this.tape.grow();
        }
        this.cc++;
    }

    moveLeft(): void {
        if (this.cc === 0) {
            throw new BoundsError(this.current, this.cc, this.tape.length);
        }
        this.cc--;
    }

    increment(): void {
        this.cell.increment();
    }

    decrement(): void {
        this.cell.decrement();
    }

    readInput(input: ByteReader): void {
        let byte: number;
        try {
            byte = input.readByte();
        } catch (err) {
            throw new TapeIOError(this.current, err);
        }
        this.cell.set(byte);
    }

    writeOutput(output: ByteWriter): void {
        const byte = this.cell.get() & 0xFF;
        try {
            output.writeByte(byte);
        } catch (err) {
            throw new TapeIOError(this.current, err);
        }
        this.tail = byte;
    }

    startLoop(): void {
        if (this.cell.get() === 0) {
            this.jump();
        }
    }

    endLoop(): void {
        if (this.cell.get() !== 0) {
            this.jump();
        }
    }

    private jump(): void {
        const op = this.current;
        if (op.partner === null) {
            throw new StructuralError(op);
        }
        this.pc = op.partner;
    }

    private reset(): void {
        this.tape = new Tape(this.initialCells, this.newCell);
        this.cc = 0;
        this.pc = 0;
        this.tail = 0;
    }

    /** Terminate the output with a newline unless it already ends with one. */
    private finish(output: ByteWriter): void {
        if (this.tail === CharCode.LF) return;
        try {
            output.writeByte(CharCode.LF);
        } catch (err) {
            console.error(`Failed to write trailing newline for ${this.program.name}:`, err);
        }
    }

    run(input: ByteReader, output: ByteWriter): void {
        this.reset();
        const prog = this.program.instructions;
        try {
            while (this.pc < prog.length) {
                const op = prog[this.pc];
                this.trace?.(op.toString());

                switch (op.type) {
                    case OpType.RIGHT:
                        this.moveRight();
                        break;
                    case OpType.LEFT:
                        this.moveLeft();
                        break;
                    case OpType.ADD:
                        this.increment();
                        break;
                    case OpType.SUB:
                        this.decrement();
                        break;
                    case OpType.OUTPUT:
                        this.writeOutput(output);
                        break;
                    case OpType.INPUT:
                        this.readInput(input);
                        break;
                    case OpType.OPEN:
                        this.startLoop();
                        break;
                    case OpType.CLOSE:
                        this.endLoop();
                        break;
                }
                this.pc++;
            }
        } finally {
            this.finish(output);
        }
    }
}

export interface RunOptions extends MachineOptions {
    name?: string;
    input?: ByteReader;
    output?: ByteWriter;
}

/** Parse, validate and run `source`, on stdin and stdout unless channels are given. */
export const run = (source: string, options: RunOptions = {}): void => {
    const { name = '<source>', input = new FdReader(), output = new FdWriter(), ...machine } = options;
    const program = new Program(name, source).validate();
    new VirtualMachine(program, machine).run(input, output);
};
