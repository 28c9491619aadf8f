export interface Pos {
  row: number;
  col: number;
}

export interface BoardConfig {
  height: number;
  width: number;
  mines: number;
  seed: number;
  // Build the board lazily so the first revealed cell is never a mine
  safeFirstMove: boolean;
}

export enum GameStatus {
  Playing = "playing",
  Won = "won",
  Lost = "lost",
}

export interface Dimensions {
  height: number;
  width: number;
}

// Read-only cell snapshot for rendering
export interface CellView {
  row: number;
  col: number;
  revealed: boolean;
  flagged: boolean;
  count: number | null;     // nearby mines, visible once revealed
  exploded: boolean;
}

export interface SentenceView {
  cells: Pos[];
  count: number;
}

/** Default config */
export const DEFAULT_CONFIG: BoardConfig = {
  height: 8,
  width: 8,
  mines: 8,
  seed: Date.now(),
  safeFirstMove: false,
};
