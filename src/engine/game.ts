import { BoardConfig, CellView, DEFAULT_CONFIG, GameStatus, Pos } from "./types";
import { Board, neighbours } from "./board";
import { CellSet, formatCell } from "./cells";
import { KnowledgeBase } from "./knowledge";
import { describeKnowledge } from "./render";
import { logDebug, logInfo, logWarning } from "../logger";

export type MoveKind = "safe" | "random";

export interface StepResult {
  cell: Pos | null;
  kind: MoveKind | null;
  count: number | null;   // nearby mines reported for the revealed cell
  flagged: Pos[];         // mines flagged after this step
}

export interface PlayResult {
  status: GameStatus;
  moves: number;
  guesses: number;
  flagged: number;
  exploded: Pos | null;
}

/**
 * Drives a KnowledgeBase against a Board: picks the agent's move, reveals it,
 * reports the observation back and flags every mine the agent has proven.
 */
export class Game {
  readonly config: BoardConfig;
  readonly height: number;
  readonly width: number;
  readonly agent: KnowledgeBase;
  status: GameStatus = GameStatus.Playing;
  explodedPos: Pos | null = null;
  moves = 0;
  guesses = 0;
  private boardInstance: Board | null = null;
  private readonly revealed = new CellSet();
  private readonly counts = new Map<string, number>();

  constructor(config: Partial<BoardConfig> = {}, options: { board?: Board; rng?: () => number } = {}) {
    const board = options.board;
    this.config = board
      ? { ...DEFAULT_CONFIG, ...config, height: board.height, width: board.width, mines: board.mineTotal, safeFirstMove: false }
      : { ...DEFAULT_CONFIG, ...config };
    this.height = this.config.height;
    this.width = this.config.width;
    this.agent = new KnowledgeBase({ height: this.height, width: this.width, rng: options.rng });

    if (board) {
      this.boardInstance = board;
    } else if (!this.config.safeFirstMove) {
      this.boardInstance = Board.random(this.config);
    }
  }

  // Lazily built on the first reveal when safeFirstMove is on
  private ensureBoard(first: Pos): Board {
    if (this.boardInstance) return this.boardInstance;
    const around = [first, ...neighbours(first.row, first.col, this.height, this.width)];
    const exclude = this.config.mines <= this.height * this.width - around.length ? around : [first];
    this.boardInstance = Board.random(this.config, exclude);
    return this.boardInstance;
  }

  get board(): Board | null {
    return this.boardInstance;
  }

  /** Make one move. Returns a null cell when the game is over or no move is left. */
  step(): StepResult {
    const none: StepResult = { cell: null, kind: null, count: null, flagged: [] };
    if (this.status !== GameStatus.Playing) return none;

    let kind: MoveKind = "safe";
    let cell = this.agent.safeMove();
    if (!cell) {
      kind = "random";
      cell = this.agent.randomMove();
    }
    if (!cell) {
      this.checkWin();
      return none;
    }

    const board = this.ensureBoard(cell);
    this.moves++;
    if (kind === "random") this.guesses++;

    if (board.isMine(cell)) {
      this.status = GameStatus.Lost;
      this.explodedPos = cell;
      logInfo("Agent hit a mine", { cell: formatCell(cell), kind, moves: this.moves });
      return { cell, kind, count: null, flagged: [] };
    }

    const count = board.nearbyMines(cell);
    this.revealed.add(cell);
    this.counts.set(formatCell(cell), count);
    this.agent.addKnowledge(cell, count);

    const flagged: Pos[] = [];
    for (const mine of this.agent.mines) {
      if (!board.isFlagged(mine)) {
        board.flag(mine);
        flagged.push(mine);
      }
    }

    logDebug(`Revealed ${formatCell(cell)} (${kind}) with ${count} nearby`, {
      knowledge: describeKnowledge(this.agent),
    });
    this.checkWin();
    return { cell, kind, count, flagged };
  }

  play(maxSteps = this.height * this.width): PlayResult {
    let steps = 0;
    while (this.status === GameStatus.Playing && steps < maxSteps) {
      const result = this.step();
      if (!result.cell) break;
      steps++;
    }
    if (this.status === GameStatus.Playing) {
      logWarning(`Game stopped after ${steps} steps while still playing`);
    }
    const flagged = this.boardInstance ? this.boardInstance.flaggedCells().length : 0;
    logInfo(`Game finished: ${this.status}`, { moves: this.moves, guesses: this.guesses, flagged });
    return {
      status: this.status,
      moves: this.moves,
      guesses: this.guesses,
      flagged,
      exploded: this.explodedPos,
    };
  }

  cellView(row: number, col: number): CellView {
    const pos = { row, col };
    const revealed = this.revealed.has(pos);
    const count = this.counts.get(formatCell(pos));
    return {
      row,
      col,
      revealed,
      flagged: this.boardInstance ? this.boardInstance.isFlagged(pos) : false,
      count: revealed && count !== undefined ? count : null,
      exploded: this.explodedPos !== null && this.explodedPos.row === row && this.explodedPos.col === col,
    };
  }

  visibleCells(): CellView[][] {
    const out: CellView[][] = [];
    for (let r = 0; r < this.height; r++) {
      const row: CellView[] = [];
      for (let c = 0; c < this.width; c++) {
        row.push(this.cellView(r, c));
      }
      out.push(row);
    }
    return out;
  }

  private checkWin(): void {
    const board = this.boardInstance;
    if (!board || this.status !== GameStatus.Playing) return;
    if (board.won() || this.revealed.size === this.height * this.width - board.mineTotal) {
      this.status = GameStatus.Won;
    }
  }
}
