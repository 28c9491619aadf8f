import { Board } from "./board";
import { formatCell } from "./cells";
import type { Game } from "./game";
import { KnowledgeBase } from "./knowledge";

// Mine layout, `|X` for a mine and `| ` otherwise
export function renderBoard(board: Board): string {
  const rule = "--".repeat(board.width) + "-";
  const lines: string[] = [];
  for (let r = 0; r < board.height; r++) {
    lines.push(rule);
    let line = "";
    for (let c = 0; c < board.width; c++) {
      line += board.isMine({ row: r, col: c }) ? "|X" : "| ";
    }
    lines.push(line + "|");
  }
  lines.push(rule);
  return lines.join("\n");
}

// Player's view: `#` hidden, `F` flagged, `*` exploded, digits for revealed
export function renderGame(game: Game): string {
  return game
    .visibleCells()
    .map((row) =>
      row
        .map((v) => {
          if (v.exploded) return "*";
          if (v.flagged) return "F";
          if (v.count !== null) return String(v.count);
          return "#";
        })
        .join(""),
    )
    .join("\n");
}

export function describeKnowledge(agent: KnowledgeBase): string {
  const lines: string[] = [];
  const sentences = agent.knowledge();
  if (sentences.length === 0) {
    lines.push("No sentences");
  } else {
    sentences.forEach((s, i) => {
      lines.push(`S#${i}: {${s.cells.map(formatCell).join(", ")}} = ${s.count}`);
    });
  }
  const pending = agent.safes.filter((c) => !agent.hasMoved(c));
  lines.push(`Safe cells: ${agent.safes.map(formatCell).join(" ")}`);
  lines.push(`Mine cells: ${agent.mines.map(formatCell).join(" ")}`);
  lines.push(`Safe moves: ${pending.map(formatCell).join(" ")}`);
  return lines.join("\n");
}
