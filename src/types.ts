// src/types.ts
export const DEFAULT_CELLS = 30000;

export enum OpType {
  LEFT = 'LEFT',
  RIGHT = 'RIGHT',
  ADD = 'ADD',
  SUB = 'SUB',
  OPEN = 'OPEN',
  CLOSE = 'CLOSE',
  OUTPUT = 'OUTPUT',
  INPUT = 'INPUT',
}

export enum CharCode {
  LF = 10,    // '\n'
  CR = 13,    // '\r'
  LT = 60,    // '<'
  GT = 62,    // '>'
  ADD = 43,   // '+'
  COMMA = 44, // ','
  SUB = 45,   // '-'
  DOT = 46,   // '.'
  LB = 91,    // '['
  RB = 93     // ']'
}

export const opMap: ReadonlyMap<number, OpType> = new Map<number, OpType>([
  [CharCode.LT, OpType.LEFT],
  [CharCode.GT, OpType.RIGHT],
  [CharCode.ADD, OpType.ADD],
  [CharCode.SUB, OpType.SUB],
  [CharCode.LB, OpType.OPEN],
  [CharCode.RB, OpType.CLOSE],
  [CharCode.DOT, OpType.OUTPUT],
  [CharCode.COMMA, OpType.INPUT],
]);

const actions: Record<OpType, string> = {
  [OpType.RIGHT]: 'Increment current pointer',
  [OpType.LEFT]: 'Decrement current pointer',
  [OpType.ADD]: 'Increment current data',
  [OpType.SUB]: 'Decrement current data',
  [OpType.OUTPUT]: 'Print out current data',
  [OpType.INPUT]: 'Type into current data',
  [OpType.OPEN]: 'Start looping',
  [OpType.CLOSE]: 'End looping',
};

/** 1-based line and column of an instruction in its source text. */
export interface SourcePosition {
  readonly line: number;
  readonly column: number;
}

export class Op {
  readonly position: SourcePosition;

  /**
   * @param partner index of the matching bracket for OPEN and CLOSE,
   *   `null` while unresolved and for every other instruction
   */
  constructor(
    public readonly type: OpType,
    line: number,
    column: number,
    public readonly partner: number | null = null
  ) {
    this.position = Object.freeze({ line, column });
  }

  get isLoop(): boolean {
    return this.type === OpType.OPEN || this.type === OpType.CLOSE;
  }

  get action(): string {
    return actions[this.type];
  }

  toString(): string {
    return `${this.position.line}:${this.position.column} ${this.action}`;
  }
}
