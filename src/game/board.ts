import type { Piece, Player } from "../types.ts";
import { ALL_SQUARES, type Square } from "./coords.ts";

export type BoardRow = Array<Piece | null>;
/** Indexed `[rank][file]`. */
export type Board = BoardRow[];

export function createEmptyBoard(): Board {
  return Array.from({ length: 8 }, () => Array<Piece | null>(8).fill(null));
}

export function cloneBoard(board: Board): Board {
  // Pieces are immutable values, so rows can share them.
  return board.map((row) => row.slice());
}

export function getPiece(board: Board, sq: Square): Piece | null {
  return board[sq.rank]?.[sq.file] ?? null;
}

export function setPiece(board: Board, sq: Square, piece: Piece | null): void {
  const row = board[sq.rank];
  if (!row) throw new Error(`setPiece: rank ${sq.rank} out of range`);
  row[sq.file] = piece;
}

export function isEmpty(board: Board, sq: Square): boolean {
  return getPiece(board, sq) === null;
}

export function findKing(board: Board, player: Player): Square | null {
  for (const sq of ALL_SQUARES) {
    const p = getPiece(board, sq);
    if (p && p.owner === player && p.kind === "K") return sq;
  }
  return null;
}

export function listPieces(board: Board): Array<{ square: Square; piece: Piece }> {
  const out: Array<{ square: Square; piece: Piece }> = [];
  for (const square of ALL_SQUARES) {
    const piece = getPiece(board, square);
    if (piece) out.push({ square, piece });
  }
  return out;
}

export function boardsEqual(a: Board, b: Board): boolean {
  for (const sq of ALL_SQUARES) {
    const pa = getPiece(a, sq);
    const pb = getPiece(b, sq);
    if (pa === null || pb === null) {
      if (pa !== pb) return false;
      continue;
    }
    if (pa.owner !== pb.owner || pa.kind !== pb.kind) return false;
  }
  return true;
}
