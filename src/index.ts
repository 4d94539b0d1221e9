// src/index.ts
export { ByteCell, byteCell } from './cell.js';
export type { Cell, CellFactory } from './cell.js';
export { BoundsError, StructuralError, TapeIOError, VMError } from './errors.js';
export type { StructuralErrorKind } from './errors.js';
export { BufferReader, BufferWriter, EndOfStreamError, FdReader, FdWriter } from './io.js';
export type { ByteReader, ByteWriter } from './io.js';
export { run, VirtualMachine } from './interp.js';
export type { MachineOptions, RunOptions } from './interp.js';
export { Program } from './program.js';
export { Tape } from './tape.js';
export { DEFAULT_CELLS, Op, OpType } from './types.js';
export type { SourcePosition } from './types.js';
