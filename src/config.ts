import { z } from "zod";
import { BoardConfig, DEFAULT_CONFIG } from "./engine/types";

const intFromString = z.coerce.number().int();

export const BoardConfigSchema = z
  .object({
    height: intFromString.min(1).max(200).default(DEFAULT_CONFIG.height),
    width: intFromString.min(1).max(200).default(DEFAULT_CONFIG.width),
    mines: intFromString.min(0).default(DEFAULT_CONFIG.mines),
    seed: intFromString.default(DEFAULT_CONFIG.seed),
    safeFirstMove: z.boolean().default(DEFAULT_CONFIG.safeFirstMove),
  })
  // the first move's cell is kept clear when safeFirstMove is on
  .refine((c) => c.mines <= c.height * c.width - (c.safeFirstMove ? 1 : 0), {
    message: "mines must fit on the board",
    path: ["mines"],
  });

export class ConfigError extends Error {
  readonly issues: z.ZodIssue[];

  constructor(message: string, issues: z.ZodIssue[]) {
    super(message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function parseConfig(input: unknown): BoardConfig {
  const result = BoardConfigSchema.safeParse(input);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${detail}`, result.error.issues);
  }
  return result.data;
}

const ENV_KEYS = {
  height: "MINESWEEPER_HEIGHT",
  width: "MINESWEEPER_WIDTH",
  mines: "MINESWEEPER_MINES",
  seed: "MINESWEEPER_SEED",
} as const;

/** Raw (unvalidated) values from the environment; unset variables are omitted. */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [field, name] of Object.entries(ENV_KEYS)) {
    const value = env[name];
    if (value !== undefined && value.trim() !== "") out[field] = value.trim();
  }
  return out;
}
