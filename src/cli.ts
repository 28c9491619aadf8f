import { parseArgs } from "node:util";
import { ConfigError, configFromEnv, parseConfig } from "./config";
import { ContradictionError, OutOfBoundsError } from "./engine/errors";
import { Game } from "./engine/game";
import { renderBoard, renderGame } from "./engine/render";
import { createRng } from "./engine/rng";
import { BoardConfig, GameStatus } from "./engine/types";
import { logError } from "./logger";

export interface CliIo {
  out: (line: string) => void;
  env: NodeJS.ProcessEnv;
}

const USAGE = [
  "Usage: minesweeper-agent [options]",
  "",
  "  --height <n>     board rows (default 8)",
  "  --width <n>      board columns (default 8)",
  "  --mines <n>      number of mines (default 8)",
  "  --seed <n>       seed for mine placement and guesses",
  "  --games <n>      number of games to play (default 1)",
  "  --safe-first     never place a mine on or around the first move",
  "  --show-board     print the mine layout and final view of each game",
  "  -h, --help       show this message",
].join("\n");

function readArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      height: { type: "string" },
      width: { type: "string" },
      mines: { type: "string" },
      seed: { type: "string" },
      games: { type: "string" },
      "safe-first": { type: "boolean", default: false },
      "show-board": { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: false,
    strict: true,
  }).values;
}

type CliValues = ReturnType<typeof readArgs>;

const defaultIo: CliIo = {
  out: (line) => console.log(line),
  env: process.env,
};

/** Plays the requested games and returns the process exit code. */
export function runCli(argv: string[], io: CliIo = defaultIo): number {
  let values: CliValues;
  try {
    values = readArgs(argv);
  } catch (err) {
    io.out(err instanceof Error ? err.message : String(err));
    io.out(USAGE);
    return 2;
  }

  if (values.help) {
    io.out(USAGE);
    return 0;
  }

  const input: Record<string, unknown> = { ...configFromEnv(io.env), safeFirstMove: values["safe-first"] ?? false };
  if (values.height !== undefined) input.height = values.height;
  if (values.width !== undefined) input.width = values.width;
  if (values.mines !== undefined) input.mines = values.mines;
  if (values.seed !== undefined) input.seed = values.seed;

  const games = Number(values.games ?? "1");
  if (!Number.isInteger(games) || games < 1) {
    io.out(`--games must be a positive integer, got ${values.games}`);
    return 2;
  }

  let config: BoardConfig;
  try {
    config = parseConfig(input);
  } catch (err) {
    if (err instanceof ConfigError) {
      io.out(err.message);
      return 2;
    }
    throw err;
  }

  let won = 0;
  for (let i = 0; i < games; i++) {
    const seed = config.seed + i;
    const game = new Game({ ...config, seed }, { rng: createRng(seed ^ 0x5bd1e995) });
    try {
      const result = game.play();
      if (result.status === GameStatus.Won) won++;
      io.out(
        `game ${i + 1}: ${result.status} after ${result.moves} moves (${result.guesses} guesses, ${result.flagged} flagged)`,
      );
    } catch (err) {
      if (err instanceof ContradictionError || err instanceof OutOfBoundsError) {
        logError("Agent stopped on inconsistent knowledge", { game: i + 1, error: err.message });
        io.out(`game ${i + 1}: error: ${err.message}`);
        return 1;
      }
      throw err;
    }
    if (values["show-board"] && game.board) {
      io.out(renderBoard(game.board));
      io.out(renderGame(game));
    }
  }

  io.out(`won ${won} of ${games}`);
  return 0;
}
