import { Dimensions, Pos, SentenceView } from "./types";
import { CellSet, compareCells, formatCell } from "./cells";
import { ContradictionError, assertInBounds } from "./errors";
import { allCells, neighbours } from "./board";
import { Sentence } from "./sentence";

export interface KnowledgeBaseOptions {
  height?: number;
  width?: number;
  // Used by randomMove; any source of floats in [0, 1)
  rng?: () => number;
}

export interface ClosureReport {
  passes: number;
  newSafes: number;
  newMines: number;
  sentences: number;
}

/**
 * The agent's knowledge: cells revealed, cells proven safe or mined, and the
 * live sentences still constraining undecided cells.
 *
 * Each instance owns all of its state; two agents never share sets.
 */
export class KnowledgeBase {
  readonly height: number;
  readonly width: number;
  private readonly rng: () => number;
  private readonly moves = new CellSet();
  private readonly safeSet = new CellSet();
  private readonly mineSet = new CellSet();
  private sentences: Sentence[] = [];

  constructor(options: KnowledgeBaseOptions = {}) {
    this.height = options.height ?? 8;
    this.width = options.width ?? 8;
    if (!Number.isInteger(this.height) || !Number.isInteger(this.width) || this.height <= 0 || this.width <= 0) {
      throw new RangeError(`Invalid board size ${this.height}x${this.width}`);
    }
    this.rng = options.rng ?? Math.random;
  }

  dimensions(): Dimensions {
    return { height: this.height, width: this.width };
  }

  // Accessors hand out sorted copies

  get movesMade(): Pos[] {
    return this.moves.sorted();
  }

  get safes(): Pos[] {
    return this.safeSet.sorted();
  }

  get mines(): Pos[] {
    return this.mineSet.sorted();
  }

  knowledge(): SentenceView[] {
    return this.sentences.map((s) => s.view()).sort(compareSentences);
  }

  isKnownSafe(cell: Pos): boolean {
    return this.safeSet.has(cell);
  }

  isKnownMine(cell: Pos): boolean {
    return this.mineSet.has(cell);
  }

  hasMoved(cell: Pos): boolean {
    return this.moves.has(cell);
  }

  /**
   * Record that `cell` was revealed safely and has `count` mines around it,
   * then draw every conclusion that follows.
   */
  addKnowledge(cell: Pos, count: number): void {
    this.assertCell(cell);
    if (!Number.isInteger(count)) {
      throw new RangeError(`Mine count must be an integer, got ${count}`);
    }

    this.recordSafe(cell);
    this.moves.add(cell);

    const sentence = new Sentence(neighbours(cell.row, cell.col, this.height, this.width), count);
    for (const c of sentence.cellList()) {
      if (this.safeSet.has(c)) sentence.markSafe(c);
      else if (this.mineSet.has(c)) sentence.markMine(c);
    }
    this.checkSentence(sentence);

    if (sentence.resolveTrivial()) this.absorb(sentence);
    if (!sentence.isEmpty) this.sentences.push(sentence);

    this.closure();
  }

  /**
   * Record a cell known safe from outside the board observations, then draw
   * every conclusion that follows. Returns true when the cell was new.
   */
  markSafe(cell: Pos): boolean {
    const added = this.recordSafe(cell);
    if (added) this.closure();
    return added;
  }

  /** Same as markSafe, for a cell known to be a mine. */
  markMine(cell: Pos): boolean {
    const added = this.recordMine(cell);
    if (added) this.closure();
    return added;
  }

  /**
   * Forward-chain to a fixed point. Each pass pushes known facts into every
   * sentence, resolves trivial sentences, drops empty and duplicate ones, then
   * applies one batch of subset reductions planned over a snapshot. Stops after
   * a pass that changes neither the facts nor the sentences.
   */
  closure(): ClosureReport {
    const safesBefore = this.safeSet.size;
    const minesBefore = this.mineSet.size;
    let passes = 0;
    let changed = true;

    while (changed) {
      passes++;
      changed = false;

      for (const sentence of this.sentences) {
        for (const c of sentence.cellList()) {
          if (this.safeSet.has(c)) sentence.markSafe(c);
          else if (this.mineSet.has(c)) sentence.markMine(c);
        }
      }

      for (const sentence of [...this.sentences]) {
        this.checkSentence(sentence);
        if (sentence.resolveTrivial() && this.absorb(sentence)) changed = true;
      }

      this.prune();
      if (this.applyReductions()) changed = true;
    }

    return {
      passes,
      newSafes: this.safeSet.size - safesBefore,
      newMines: this.mineSet.size - minesBefore,
      sentences: this.sentences.length,
    };
  }

  /** Lowest unrevealed cell known to be safe, or null. */
  safeMove(): Pos | null {
    for (const cell of this.safeSet.sorted()) {
      if (!this.moves.has(cell)) return cell;
    }
    return null;
  }

  /** Any cell neither revealed nor known to be a mine, or null when none is left. */
  randomMove(): Pos | null {
    const candidates = allCells(this.height, this.width).filter(
      (c) => !this.moves.has(c) && !this.mineSet.has(c),
    );
    if (candidates.length === 0) return null;
    const idx = Math.min(candidates.length - 1, Math.floor(this.rng() * candidates.length));
    return candidates[idx];
  }

  private assertCell(cell: Pos): void {
    assertInBounds(cell, this.height, this.width);
  }

  private recordSafe(cell: Pos): boolean {
    this.assertCell(cell);
    if (this.mineSet.has(cell)) {
      throw new ContradictionError(`Cell ${formatCell(cell)} is already known to be a mine`, { cell });
    }
    if (!this.safeSet.add(cell)) return false;
    for (const sentence of this.sentences) {
      if (!sentence.has(cell)) continue;
      sentence.markSafe(cell);
      this.checkSentence(sentence);
    }
    return true;
  }

  private recordMine(cell: Pos): boolean {
    this.assertCell(cell);
    if (this.safeSet.has(cell)) {
      throw new ContradictionError(`Cell ${formatCell(cell)} is already known to be safe`, { cell });
    }
    if (!this.mineSet.add(cell)) return false;
    for (const sentence of this.sentences) {
      if (!sentence.has(cell)) continue;
      sentence.markMine(cell);
      this.checkSentence(sentence);
    }
    return true;
  }

  private checkSentence(sentence: Sentence): void {
    if (sentence.isConsistent()) return;
    throw new ContradictionError(
      `Sentence ${sentence.toString()} needs a mine count between 0 and ${sentence.size}`,
      { sentence: sentence.toString() },
    );
  }

  // Copy a sentence's conclusions into the global sets
  private absorb(sentence: Sentence): boolean {
    let grew = false;
    for (const cell of sentence.knownSafes()) {
      if (this.recordSafe(cell)) grew = true;
    }
    for (const cell of sentence.knownMines()) {
      if (this.recordMine(cell)) grew = true;
    }
    return grew;
  }

  // Drop resolved sentences and duplicates
  private prune(): void {
    const byCells = new Map<string, Sentence>();
    const kept: Sentence[] = [];
    for (const sentence of this.sentences) {
      this.checkSentence(sentence);
      if (sentence.isEmpty) continue;
      const key = sentence.cellSignature();
      const existing = byCells.get(key);
      if (existing) {
        if (existing.count !== sentence.count) {
          throw new ContradictionError(
            `Sentences ${existing.toString()} and ${sentence.toString()} disagree on the same cells`,
            { sentence: sentence.toString() },
          );
        }
        continue;
      }
      byCells.set(key, sentence);
      kept.push(sentence);
    }
    this.sentences = kept;
  }

  // Plan every subset reduction against the current sentences, then swap each
  // reduced superset for the differences it yielded
  private applyReductions(): boolean {
    const snapshot = this.sentences;
    const replaced = new Set<Sentence>();
    const derived: Sentence[] = [];

    for (const small of snapshot) {
      for (const big of snapshot) {
        if (small === big) continue;
        const reduction = small.reductionOf(big);
        if (!reduction) continue;
        replaced.add(big);
        derived.push(new Sentence(reduction.cells, reduction.count));
      }
    }

    if (derived.length === 0) return false;
    this.sentences = snapshot.filter((s) => !replaced.has(s)).concat(derived);
    return true;
  }
}

// Row-major over the sentences' cells, then by count
function compareSentences(a: SentenceView, b: SentenceView): number {
  const n = Math.min(a.cells.length, b.cells.length);
  for (let i = 0; i < n; i++) {
    const order = compareCells(a.cells[i], b.cells[i]);
    if (order !== 0) return order;
  }
  if (a.cells.length !== b.cells.length) return a.cells.length - b.cells.length;
  return a.count - b.count;
}
