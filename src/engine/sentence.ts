import { Pos, SentenceView } from "./types";
import { CellSet, formatCell } from "./cells";

export interface Reduction {
  cells: CellSet;
  count: number;
}

/**
 * A constraint stating that exactly `count` of `cells` are mines.
 *
 * Cells leave the sentence as they are proven safe or mines; the proven cells
 * are kept in the sentence's own `knownSafes()`/`knownMines()` output so the
 * knowledge base can pick them up after a resolution.
 */
export class Sentence {
  private cellSet: CellSet;
  private mineCount: number;
  private readonly safes = new CellSet();
  private readonly mines = new CellSet();

  constructor(cells: Iterable<Pos>, count: number) {
    this.cellSet = new CellSet(cells);
    this.mineCount = count;
  }

  get count(): number {
    return this.mineCount;
  }

  get size(): number {
    return this.cellSet.size;
  }

  get isEmpty(): boolean {
    return this.cellSet.size === 0;
  }

  has(cell: Pos): boolean {
    return this.cellSet.has(cell);
  }

  cellList(): Pos[] {
    return this.cellSet.sorted();
  }

  // count within [0, |cells|]
  isConsistent(): boolean {
    return this.mineCount >= 0 && this.mineCount <= this.cellSet.size;
  }

  isSafeTrivial(): boolean {
    return this.mineCount === 0;
  }

  isMineTrivial(): boolean {
    return this.mineCount > 0 && this.mineCount === this.cellSet.size;
  }

  /** Cells this sentence has proven safe, plus the ones it implies right now. */
  knownSafes(): Pos[] {
    const out = this.safes.clone();
    if (this.isSafeTrivial()) {
      for (const cell of this.cellSet) out.add(cell);
    }
    return out.sorted();
  }

  /** Cells this sentence has proven to be mines, plus the ones it implies right now. */
  knownMines(): Pos[] {
    const out = this.mines.clone();
    if (this.isMineTrivial()) {
      for (const cell of this.cellSet) out.add(cell);
    }
    return out.sorted();
  }

  // No underflow check: a negative count is left for the caller to report
  markMine(cell: Pos): void {
    if (this.cellSet.delete(cell)) this.mineCount--;
    this.mines.add(cell);
  }

  markSafe(cell: Pos): void {
    this.cellSet.delete(cell);
    this.safes.add(cell);
  }

  /** Resolve by exhaustion. Returns true when every remaining cell was decided. */
  resolveTrivial(): boolean {
    if (this.isEmpty) return false;
    if (this.isSafeTrivial()) {
      for (const cell of this.cellSet.sorted()) this.markSafe(cell);
      return true;
    }
    if (this.isMineTrivial()) {
      for (const cell of this.cellSet.sorted()) this.markMine(cell);
      return true;
    }
    return false;
  }

  /**
   * The sentence implied when this sentence's cells are a non-empty subset of
   * `other`'s: `other.cells - cells` holds `other.count - count` mines. Equal
   * cell sets leave an empty remainder whose count must be 0. Null when no
   * inference follows.
   */
  reductionOf(other: Sentence): Reduction | null {
    if (this.isEmpty || this.cellSet.size > other.cellSet.size) return null;
    if (!this.cellSet.isSubsetOf(other.cellSet)) return null;
    return {
      cells: other.cellSet.difference(this.cellSet),
      count: other.mineCount - this.mineCount,
    };
  }

  /**
   * Subset rule applied in place: whichever of the two sentences contains the
   * other is rewritten to the difference (`other` first when the cells are
   * equal). Returns false when neither is a subset of the other, or when
   * either side is empty.
   */
  reduceWith(other: Sentence): boolean {
    const forward = this.reductionOf(other);
    if (forward) {
      other.replace(forward);
      return true;
    }
    const backward = other.reductionOf(this);
    if (backward) {
      this.replace(backward);
      return true;
    }
    return false;
  }

  equals(other: Sentence): boolean {
    return this.mineCount === other.mineCount && this.cellSet.equals(other.cellSet);
  }

  cellSignature(): string {
    return this.cellSet.signature();
  }

  view(): SentenceView {
    return { cells: this.cellSet.sorted(), count: this.mineCount };
  }

  toString(): string {
    return `{${this.cellSet.sorted().map(formatCell).join(", ")}} = ${this.mineCount}`;
  }

  private replace(reduction: Reduction): void {
    this.cellSet = reduction.cells.clone();
    this.mineCount = reduction.count;
  }
}
