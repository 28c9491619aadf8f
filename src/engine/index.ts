export { Game } from "./game";
export type { MoveKind, StepResult, PlayResult } from "./game";
export { Board, neighbours, allCells, placeMines } from "./board";
export { KnowledgeBase } from "./knowledge";
export type { KnowledgeBaseOptions, ClosureReport } from "./knowledge";
export { Sentence } from "./sentence";
export type { Reduction } from "./sentence";
export { CellSet, posKey, compareCells, formatCell } from "./cells";
export { ContradictionError, OutOfBoundsError } from "./errors";
export { createRng, shuffle } from "./rng";
export { renderBoard, renderGame, describeKnowledge } from "./render";
export type {
  BoardConfig,
  CellView,
  Dimensions,
  Pos,
  SentenceView,
} from "./types";
export { GameStatus, DEFAULT_CONFIG } from "./types";
