// src/cell.ts

/**
 * Storage for one tape cell. A freshly created cell holds its zero value;
 * increment and decrement wrap around at the cell's width.
 */
export interface Cell {
    increment(): void;
    decrement(): void;
    get(): number;
    set(value: number): void;
}

export type CellFactory = () => Cell;

/** 8-bit cell, arithmetic mod 256. */
export class ByteCell implements Cell {
    private value = 0;

    increment(): void {
        this.value = (this.value + 1) & 0xFF;
    }

    decrement(): void {
        this.value = (this.value - 1) & 0xFF;
    }

    get(): number {
        return this.value;
    }

    set(value: number): void {
        this.value = value & 0xFF;
    }
}

export const byteCell: CellFactory = () => new ByteCell();
