// ─── Engine tests ───────────────────────────────────────────────────────────

import { describe, it, expect, vi } from "vitest";
import {
  Board,
  Game,
  GameStatus,
  OutOfBoundsError,
  createRng,
  neighbours,
  placeMines,
  renderBoard,
  renderGame,
} from "../src/engine/index";

const p = (row: number, col: number) => ({ row, col });

// ─── RNG determinism ────────────────────────────────────────────────────────

describe("createRng", () => {
  it("produces deterministic sequences", () => {
    const a = createRng(42);
    const b = createRng(42);
    for (let i = 0; i < 100; i++) {
      expect(a()).toBe(b());
    }
  });

  it("stays within [0, 1)", () => {
    const rng = createRng(7);
    for (let i = 0; i < 1000; i++) {
      const v = rng();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });
});

// ─── Neighbours ─────────────────────────────────────────────────────────────

describe("neighbours", () => {
  it("returns 8 neighbours for a centre cell", () => {
    expect(neighbours(5, 5, 10, 10)).toHaveLength(8);
  });

  it("returns 3 neighbours for a corner cell", () => {
    expect(neighbours(0, 0, 10, 10)).toEqual([p(0, 1), p(1, 0), p(1, 1)]);
  });

  it("returns 5 neighbours for an edge cell", () => {
    expect(neighbours(0, 5, 10, 10)).toHaveLength(5);
  });
});

// ─── Mine placement ─────────────────────────────────────────────────────────

describe("placeMines", () => {
  it("places the requested number of distinct mines", () => {
    const mines = placeMines({ height: 10, width: 10, mines: 30, seed: 42 });
    expect(mines).toHaveLength(30);
    expect(new Set(mines.map((m) => `${m.row},${m.col}`)).size).toBe(30);
  });

  it("excludes positions when specified", () => {
    const mines = placeMines({ height: 4, width: 4, mines: 14, seed: 99 }, [p(2, 2), p(2, 3)]);
    expect(mines.some((m) => m.row === 2 && m.col === 2)).toBe(false);
    expect(mines.some((m) => m.row === 2 && m.col === 3)).toBe(false);
  });

  it("is deterministic for the same seed", () => {
    const config = { height: 8, width: 8, mines: 10, seed: 777 };
    expect(placeMines(config)).toEqual(placeMines(config));
  });

  it("refuses more mines than eligible cells", () => {
    expect(() => placeMines({ height: 2, width: 2, mines: 4, seed: 1 }, [p(0, 0)])).toThrow(RangeError);
  });
});

// ─── Board ──────────────────────────────────────────────────────────────────

describe("Board", () => {
  const board = () => new Board(4, 4, [p(1, 1), p(2, 2), p(3, 3)]);

  it("identifies mines", () => {
    const b = board();
    expect(b.isMine(p(1, 1))).toBe(true);
    expect(b.isMine(p(0, 0))).toBe(false);
    expect(b.mineCells()).toEqual([p(1, 1), p(2, 2), p(3, 3)]);
  });

  it("counts nearby mines", () => {
    const b = board();
    expect(b.nearbyMines(p(0, 0))).toBe(1);
    expect(b.nearbyMines(p(1, 0))).toBe(1);
    expect(b.nearbyMines(p(1, 1))).toBe(1);
    expect(b.nearbyMines(p(2, 2))).toBe(2);
    expect(b.neighborCount(p(3, 2))).toBe(2);
  });

  it("reports its dimensions", () => {
    expect(board().dimensions()).toEqual({ height: 4, width: 4 });
  });

  it("rejects cells outside the board", () => {
    expect(() => board().isMine(p(4, 0))).toThrow(OutOfBoundsError);
    expect(() => new Board(2, 2, [p(2, 2)])).toThrow(OutOfBoundsError);
  });

  it("is won when exactly the mines are flagged", () => {
    const b = board();
    expect(b.won()).toBe(false);
    b.flag(p(1, 1));
    b.flag(p(2, 2));
    b.flag(p(3, 3));
    expect(b.won()).toBe(true);
    b.flag(p(0, 0));
    expect(b.won()).toBe(false);
  });

  it("keeps the excluded cell clear when generated", () => {
    const b = Board.random({ height: 4, width: 4, mines: 15, seed: 3 }, [p(0, 0)]);
    expect(b.mineTotal).toBe(15);
    expect(b.isMine(p(0, 0))).toBe(false);
  });
});

// ─── Game driver ────────────────────────────────────────────────────────────

describe("Game", () => {
  const scripted = () => new Game({}, { board: new Board(3, 3, [p(1, 0)]), rng: () => 0 });

  it("takes its size from an explicit board", () => {
    const game = scripted();
    expect(game.config.height).toBe(3);
    expect(game.config.mines).toBe(1);
  });

  it("guesses, infers and flags its way to a win", () => {
    const game = scripted();
    expect(game.step()).toEqual({ cell: p(0, 0), kind: "random", count: 1, flagged: [] });
    expect(game.step()).toEqual({ cell: p(0, 1), kind: "random", count: 1, flagged: [] });
    expect(game.step()).toEqual({ cell: p(0, 2), kind: "safe", count: 0, flagged: [p(1, 0)] });
    expect(game.status).toBe(GameStatus.Won);
    expect(game.step().cell).toBeNull();
  });

  it("reports the outcome of a full game", () => {
    expect(scripted().play()).toEqual({
      status: GameStatus.Won,
      moves: 3,
      guesses: 2,
      flagged: 1,
      exploded: null,
    });
  });

  it("warns when it runs out of steps mid-game", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    try {
      expect(scripted().play(1).status).toBe(GameStatus.Playing);
      expect(warn).toHaveBeenCalledWith("[warn] Game stopped after 1 steps while still playing");
    } finally {
      warn.mockRestore();
    }
  });

  it("loses on a mine", () => {
    const game = new Game({}, { board: new Board(2, 2, [p(0, 0)]), rng: () => 0 });
    expect(game.step()).toEqual({ cell: p(0, 0), kind: "random", count: null, flagged: [] });
    expect(game.status).toBe(GameStatus.Lost);
    expect(game.explodedPos).toEqual(p(0, 0));
    expect(renderGame(game)).toBe("*#\n##");
  });

  it("never loses on the first move with safeFirstMove", () => {
    const game = new Game(
      { height: 8, width: 8, mines: 10, seed: 5, safeFirstMove: true },
      { rng: createRng(11) },
    );
    expect(game.board).toBeNull();
    const { cell } = game.step();
    const board = game.board;
    if (!board || !cell) throw new Error("first move did not build the board");
    expect(board.isMine(cell)).toBe(false);
    expect(board.nearbyMines(cell)).toBe(0);
    expect(game.status).not.toBe(GameStatus.Lost);
  });

  it("only ever derives facts that match the board", () => {
    for (let seed = 1; seed <= 30; seed++) {
      const game = new Game(
        { height: 8, width: 8, mines: 10, seed, safeFirstMove: true },
        { rng: createRng(seed) },
      );
      game.play();
      const board = game.board;
      if (!board) throw new Error(`seed ${seed} never built a board`);
      for (const cell of game.agent.safes) expect(board.isMine(cell)).toBe(false);
      for (const cell of game.agent.mines) expect(board.isMine(cell)).toBe(true);
      expect(game.status).not.toBe(GameStatus.Playing);
    }
  });
});

// ─── Text rendering ─────────────────────────────────────────────────────────

describe("render", () => {
  it("draws the mine layout", () => {
    const board = new Board(2, 2, [p(0, 0)]);
    expect(renderBoard(board)).toBe(["-----", "|X| |", "-----", "| | |", "-----"].join("\n"));
  });

  it("draws the player's view", () => {
    const game = new Game({}, { board: new Board(3, 3, [p(1, 0)]), rng: () => 0 });
    game.play();
    expect(renderGame(game)).toBe(["110", "F##", "###"].join("\n"));
  });
});
