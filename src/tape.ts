// src/tape.ts
import { byteCell } from './cell.js';
import type { Cell, CellFactory } from './cell.js';
import { DEFAULT_CELLS } from './types.js';

/** Cells indexed from 0. Grows one cell at a time at the high end, never shrinks. */
export class Tape {
    private readonly cells: Cell[];

    /** @param length 0 selects `DEFAULT_CELLS` */
    constructor(length: number = DEFAULT_CELLS, private readonly newCell: CellFactory = byteCell) {
        if (!Number.isInteger(length) || length < 0) {
            throw new RangeError(`Invalid tape length: ${length}`);
        }
        const size = length > 0 ? length : DEFAULT_CELLS;
        this.cells = Array.from({ length: size }, () => newCell());
    }

    get length(): number {
        return this.cells.length;
    }

    at(index: number): Cell {
        if (index < 0 || index >= this.cells.length) {
            throw new RangeError(`Cell ${index} is outside a tape of ${this.cells.length} cells`);
        }
        return this.cells[index];
    }

    grow(): void {
        this.cells.push(this.newCell());
    }
}
