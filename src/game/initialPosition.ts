import type { PieceKind, Player } from "../types.ts";
import { createEmptyBoard, setPiece, type Board } from "./board.ts";
import { makeSquare } from "./coords.ts";

export const BACK_RANK: readonly PieceKind[] = ["R", "N", "B", "Q", "K", "B", "N", "R"];

export function homeRank(player: Player): 0 | 7 {
  return player === "W" ? 0 : 7;
}

export function pawnRank(player: Player): 1 | 6 {
  return player === "W" ? 1 : 6;
}

/** Where that player's pawns promote. */
export function lastRank(player: Player): 0 | 7 {
  return player === "W" ? 7 : 0;
}

export function createStartingBoard(): Board {
  const board = createEmptyBoard();
  for (const owner of ["W", "B"] as const) {
    BACK_RANK.forEach((kind, file) => {
      setPiece(board, makeSquare(homeRank(owner), file), { owner, kind });
      setPiece(board, makeSquare(pawnRank(owner), file), { owner, kind: "P" });
    });
  }
  return board;
}
