import { Pos } from "./types";

export function posKey(pos: Pos): string {
  return `${pos.row},${pos.col}`;
}

export function compareCells(a: Pos, b: Pos): number {
  if (a.row !== b.row) return a.row - b.row;
  return a.col - b.col;
}

export function formatCell(pos: Pos): string {
  return `(${pos.row},${pos.col})`;
}

/**
 * Set of cells compared by value. Plain `Set<Pos>` compares object identity,
 * so cells are keyed by `posKey` and the first instance seen is kept.
 */
export class CellSet implements Iterable<Pos> {
  private readonly byKey = new Map<string, Pos>();

  constructor(cells: Iterable<Pos> = []) {
    for (const cell of cells) this.add(cell);
  }

  get size(): number {
    return this.byKey.size;
  }

  has(cell: Pos): boolean {
    return this.byKey.has(posKey(cell));
  }

  /** Returns true when the cell was not present before. */
  add(cell: Pos): boolean {
    const key = posKey(cell);
    if (this.byKey.has(key)) return false;
    this.byKey.set(key, { row: cell.row, col: cell.col });
    return true;
  }

  delete(cell: Pos): boolean {
    return this.byKey.delete(posKey(cell));
  }

  isSubsetOf(other: CellSet): boolean {
    if (this.size > other.size) return false;
    for (const key of this.byKey.keys()) {
      if (!other.byKey.has(key)) return false;
    }
    return true;
  }

  equals(other: CellSet): boolean {
    return this.size === other.size && this.isSubsetOf(other);
  }

  difference(other: CellSet): CellSet {
    const out = new CellSet();
    for (const [key, cell] of this.byKey) {
      if (!other.byKey.has(key)) out.byKey.set(key, cell);
    }
    return out;
  }

  clone(): CellSet {
    return new CellSet(this.byKey.values());
  }

  /** Cells in row-major order. */
  sorted(): Pos[] {
    return [...this.byKey.values()].map((p) => ({ ...p })).sort(compareCells);
  }

  /** Canonical text used to compare and deduplicate cell sets. */
  signature(): string {
    return this.sorted().map(posKey).join(";");
  }

  [Symbol.iterator](): Iterator<Pos> {
    return this.byKey.values();
  }
}
