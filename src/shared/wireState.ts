import type { Piece, PieceKind } from "../types.ts";
import { createEmptyBoard, getPiece, setPiece } from "../game/board.ts";
import { isBoardIndex, makeSquare, type Square } from "../game/coords.ts";
import type { GameState } from "../game/state.ts";

/** FEN letter: uppercase White, lowercase Black. */
export type WirePiece = string;

export type WireSquare = { rank: number; file: number };

export type WireGameState = {
  /** `board[rank][file]`, rank 0 = White's home rank. */
  board: Array<Array<WirePiece | null>>;
  turn: "W" | "B";
  enPassantFile: number | null;
  halfMoveClock: number;
  whiteKingMoved: boolean;
  blackKingMoved: boolean;
  whiteARookMoved: boolean;
  blackARookMoved: boolean;
  whiteHRookMoved: boolean;
  blackHRookMoved: boolean;
  pendingPromotion: boolean;
};

const WIRE_KINDS: Record<string, PieceKind> = { K: "K", Q: "Q", R: "R", N: "N", B: "B", P: "P" };

function pieceToWire(p: Piece): WirePiece {
  return p.owner === "W" ? p.kind : p.kind.toLowerCase();
}

function pieceFromWire(w: WirePiece): Piece {
  const kind = WIRE_KINDS[w.toUpperCase()];
  if (!kind || w.length !== 1) throw new Error(`Invalid wire piece: ${w}`);
  return { owner: w === w.toUpperCase() ? "W" : "B", kind };
}

export function squareToWire(sq: Square): WireSquare {
  return { rank: sq.rank, file: sq.file };
}

export function squareFromWire(raw: unknown): Square | null {
  if (!raw || typeof raw !== "object" || !("rank" in raw) || !("file" in raw)) return null;
  const { rank, file } = raw;
  if (!isBoardIndex(rank) || !isBoardIndex(file)) return null;
  return makeSquare(rank, file);
}

export function serializeWireGameState(state: GameState): WireGameState {
  const board: WireGameState["board"] = [];
  for (let rank = 0; rank < 8; rank++) {
    const row: Array<WirePiece | null> = [];
    for (let file = 0; file < 8; file++) {
      const p = getPiece(state.board, makeSquare(rank, file));
      row.push(p ? pieceToWire(p) : null);
    }
    board.push(row);
  }

  return {
    board,
    turn: state.turn,
    enPassantFile: state.enPassantFile,
    halfMoveClock: state.halfMoveClock,
    whiteKingMoved: state.whiteKingMoved,
    blackKingMoved: state.blackKingMoved,
    whiteARookMoved: state.whiteARookMoved,
    blackARookMoved: state.blackARookMoved,
    whiteHRookMoved: state.whiteHRookMoved,
    blackHRookMoved: state.blackHRookMoved,
    pendingPromotion: state.pendingPromotion,
  };
}

export function deserializeWireGameState(wire: WireGameState): GameState {
  if (!Array.isArray(wire.board) || wire.board.length !== 8) throw new Error("Wire board must have 8 ranks");

  const board = createEmptyBoard();
  wire.board.forEach((row, rank) => {
    if (!Array.isArray(row) || row.length !== 8) throw new Error(`Wire rank ${rank} must have 8 files`);
    row.forEach((cell, file) => {
      if (cell !== null) setPiece(board, makeSquare(rank, file), pieceFromWire(cell));
    });
  });

  const ep = wire.enPassantFile;
  if (ep !== null && !isBoardIndex(ep)) throw new Error(`Invalid en passant file: ${ep}`);

  return {
    board,
    turn: wire.turn === "B" ? "B" : "W",
    enPassantFile: ep,
    halfMoveClock: Math.max(0, Math.trunc(Number(wire.halfMoveClock) || 0)),
    whiteKingMoved: Boolean(wire.whiteKingMoved),
    blackKingMoved: Boolean(wire.blackKingMoved),
    whiteARookMoved: Boolean(wire.whiteARookMoved),
    blackARookMoved: Boolean(wire.blackARookMoved),
    whiteHRookMoved: Boolean(wire.whiteHRookMoved),
    blackHRookMoved: Boolean(wire.blackHRookMoved),
    pendingPromotion: Boolean(wire.pendingPromotion),
  };
}
