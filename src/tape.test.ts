import { describe, expect, it } from 'vitest';
import { ByteCell } from './cell.js';
import { Tape } from './tape.js';
import { DEFAULT_CELLS } from './types.js';

describe('Tape', () => {
    it('defaults to 30000 cells, also for a length of 0', () => {
        expect(new Tape().length).toBe(DEFAULT_CELLS);
        expect(new Tape(0).length).toBe(30000);
    });

    it('rejects negative and fractional lengths', () => {
        expect(() => new Tape(-1)).toThrowError(RangeError);
        expect(() => new Tape(2.5)).toThrowError(RangeError);
    });

    it('grows by one zeroed cell at the high end', () => {
        const tape = new Tape(3);
        tape.at(2).set(7);
        tape.grow();
        expect(tape.length).toBe(4);
        expect(tape.at(2).get()).toBe(7);
        expect(tape.at(3).get()).toBe(0);
    });

    it('refuses indexes outside the tape', () => {
        const tape = new Tape(2);
        expect(() => tape.at(-1)).toThrowError('Cell -1 is outside a tape of 2 cells');
        expect(() => tape.at(2)).toThrowError(RangeError);
    });

    it('creates cells through the given factory', () => {
        let created = 0;
        const tape = new Tape(2, () => {
            created++;
            return new ByteCell();
        });
        tape.grow();
        expect(created).toBe(3);
    });
});
