import { getPiece, type Board } from "./board.ts";
import { makeSquare } from "./coords.ts";

/** Rank 8 first, White uppercase, `.` for empty squares. */
export function boardToText(board: Board): string {
  const lines: string[] = [];
  for (let rank = 7; rank >= 0; rank--) {
    let line = `${rank + 1} `;
    for (let file = 0; file < 8; file++) {
      const p = getPiece(board, makeSquare(rank, file));
      line += p ? (p.owner === "W" ? p.kind : p.kind.toLowerCase()) : ".";
    }
    lines.push(line);
  }
  lines.push("  abcdefgh");
  return lines.join("\n");
}
