import { BoardConfig, DEFAULT_CONFIG, Dimensions, Pos } from "./types";
import { CellSet, compareCells } from "./cells";
import { assertInBounds } from "./errors";
import { createRng, shuffle } from "./rng";

const NEIGHBOUR_DELTAS: ReadonlyArray<{ dr: number; dc: number }> = (() => {
  const deltas: Array<{ dr: number; dc: number }> = [];
  for (let dr = -1; dr <= 1; dr++) {
    for (let dc = -1; dc <= 1; dc++) {
      if (dr === 0 && dc === 0) continue;
      deltas.push({ dr, dc });
    }
  }
  return deltas;
})();

// The up-to-8 grid-adjacent cells, clipped to the board, row-major
export function neighbours(row: number, col: number, height: number, width: number): Pos[] {
  const result: Pos[] = [];
  for (const { dr, dc } of NEIGHBOUR_DELTAS) {
    const r = row + dr;
    const c = col + dc;
    if (r < 0 || r >= height || c < 0 || c >= width) continue;
    result.push({ row: r, col: c });
  }
  return result;
}

export function allCells(height: number, width: number): Pos[] {
  const cells: Pos[] = [];
  for (let r = 0; r < height; r++) {
    for (let c = 0; c < width; c++) {
      cells.push({ row: r, col: c });
    }
  }
  return cells;
}

// Pick `mines` distinct cells uniformly, never from `excludePositions`
export function placeMines(
  config: Pick<BoardConfig, "height" | "width" | "mines" | "seed">,
  excludePositions: Pos[] = [],
): Pos[] {
  const { height, width, mines, seed } = config;
  const excludeSet = new CellSet(excludePositions);
  const eligible = allCells(height, width).filter((p) => !excludeSet.has(p));
  if (!Number.isInteger(mines) || mines < 0 || mines > eligible.length) {
    throw new RangeError(
      `Cannot place ${mines} mines on a ${height}x${width} board with ${eligible.length} eligible cells`,
    );
  }
  return shuffle(eligible, createRng(seed)).slice(0, mines).sort(compareCells);
}

/**
 * Ground truth for one game: where the mines are and how many surround each
 * cell. The inference engine never reads it; only the driver does.
 */
export class Board {
  readonly height: number;
  readonly width: number;
  private readonly mines: CellSet;
  private readonly minesFound = new CellSet();

  constructor(height: number, width: number, mines: Iterable<Pos>) {
    if (!Number.isInteger(height) || !Number.isInteger(width) || height <= 0 || width <= 0) {
      throw new RangeError(`Invalid board size ${height}x${width}`);
    }
    this.height = height;
    this.width = width;
    this.mines = new CellSet();
    for (const mine of mines) {
      assertInBounds(mine, height, width);
      this.mines.add(mine);
    }
  }

  static random(config: Partial<BoardConfig> = {}, excludePositions: Pos[] = []): Board {
    const full = { ...DEFAULT_CONFIG, ...config };
    return new Board(full.height, full.width, placeMines(full, excludePositions));
  }

  get mineTotal(): number {
    return this.mines.size;
  }

  dimensions(): Dimensions {
    return { height: this.height, width: this.width };
  }

  isMine(cell: Pos): boolean {
    assertInBounds(cell, this.height, this.width);
    return this.mines.has(cell);
  }

  nearbyMines(cell: Pos): number {
    assertInBounds(cell, this.height, this.width);
    let count = 0;
    for (const n of neighbours(cell.row, cell.col, this.height, this.width)) {
      if (this.mines.has(n)) count++;
    }
    return count;
  }

  neighborCount(cell: Pos): number {
    return this.nearbyMines(cell);
  }

  /** Record a cell the player believes is a mine. */
  flag(cell: Pos): void {
    assertInBounds(cell, this.height, this.width);
    this.minesFound.add(cell);
  }

  isFlagged(cell: Pos): boolean {
    return this.minesFound.has(cell);
  }

  flaggedCells(): Pos[] {
    return this.minesFound.sorted();
  }

  mineCells(): Pos[] {
    return this.mines.sorted();
  }

  // Won when the flagged cells are exactly the mines
  won(): boolean {
    return this.minesFound.equals(this.mines);
  }
}
