import { formatCell } from "./cells";
import { Pos } from "./types";

/**
 * Raised when observations cannot all be true: a cell is both safe and a mine,
 * or a sentence claims a mine count outside `[0, |cells|]`. The knowledge base
 * that raised it is left as it was at the failure and should be discarded.
 */
export class ContradictionError extends Error {
  readonly cell?: Pos;
  readonly sentence?: string;

  constructor(message: string, details: { cell?: Pos; sentence?: string } = {}) {
    super(message);
    this.name = "ContradictionError";
    this.cell = details.cell;
    this.sentence = details.sentence;
  }
}

export class OutOfBoundsError extends Error {
  readonly cell: Pos;

  constructor(cell: Pos, height: number, width: number) {
    super(`Cell ${formatCell(cell)} is outside the ${height}x${width} board`);
    this.name = "OutOfBoundsError";
    this.cell = { row: cell.row, col: cell.col };
  }
}

export function assertInBounds(cell: Pos, height: number, width: number): void {
  const valid =
    Number.isInteger(cell.row) &&
    Number.isInteger(cell.col) &&
    cell.row >= 0 &&
    cell.row < height &&
    cell.col >= 0 &&
    cell.col < width;
  if (!valid) throw new OutOfBoundsError(cell, height, width);
}
