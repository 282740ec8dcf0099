import { opponentOf } from "../types.ts";
import { getPiece, isEmpty, setPiece } from "./board.ts";
import { makeSquare, type Square } from "./coords.ts";
import { InvalidMoveError } from "./errors.ts";
import { homeRank, lastRank } from "./initialPosition.ts";
import type { Move } from "./moveTypes.ts";
import { castlingSideOf, isLegalMove } from "./movegen.ts";
import { cloneGameState, type CastlingFlags, type GameState } from "./state.ts";

export type MoveOutcome =
  | {
      ok: true;
      state: GameState;
      /** More than the two named squares changed (castling, en passant). */
      redraw: boolean;
    }
  | { ok: false; error: InvalidMoveError };

const CASTLING_SQUARE_FLAGS: ReadonlyArray<{ rank: number; file: number; flag: keyof CastlingFlags }> = [
  { rank: 0, file: 4, flag: "whiteKingMoved" },
  { rank: 7, file: 4, flag: "blackKingMoved" },
  { rank: 0, file: 0, flag: "whiteARookMoved" },
  { rank: 7, file: 0, flag: "blackARookMoved" },
  { rank: 0, file: 7, flag: "whiteHRookMoved" },
  { rank: 7, file: 7, flag: "blackHRookMoved" },
];

function markCastlingSquaresTouched(next: GameState, squares: Square[]): void {
  for (const sq of squares) {
    for (const entry of CASTLING_SQUARE_FLAGS) {
      if (entry.rank === sq.rank && entry.file === sq.file) next[entry.flag] = true;
    }
  }
}

/**
 * Validates and plays a move, returning the next state.
 * The input state is never mutated, so a rejected move leaves it as it was.
 */
export function applyMove(state: GameState, move: Move): MoveOutcome {
  if (state.pendingPromotion) {
    return { ok: false, error: new InvalidMoveError("Promotion pending") };
  }
  if (!isLegalMove(state, move)) {
    return { ok: false, error: new InvalidMoveError() };
  }

  const piece = getPiece(state.board, move.from);
  if (!piece) return { ok: false, error: new InvalidMoveError() };

  const next = cloneGameState(state);
  const { board } = next;
  let redraw = false;
  const isPawn = piece.kind === "P";
  let isCapture = !isEmpty(board, move.to);

  if (isPawn && !isCapture && move.from.file !== move.to.file) {
    setPiece(board, makeSquare(move.from.rank, move.to.file), null);
    isCapture = true;
    redraw = true;
  }

  next.halfMoveClock = isCapture || isPawn ? 0 : state.halfMoveClock + 1;

  setPiece(board, move.from, null);
  setPiece(board, move.to, piece);

  next.enPassantFile = isPawn && Math.abs(move.to.rank - move.from.rank) === 2 ? move.to.file : null;

  markCastlingSquaresTouched(next, [move.from, move.to]);

  if (piece.kind === "K") {
    const side = castlingSideOf(move, piece.owner);
    if (side) {
      const rank = homeRank(piece.owner);
      const rookFrom = makeSquare(rank, side === "kingSide" ? 7 : 0);
      const rookTo = makeSquare(rank, side === "kingSide" ? 5 : 3);
      setPiece(board, rookTo, getPiece(board, rookFrom));
      setPiece(board, rookFrom, null);
      markCastlingSquaresTouched(next, [rookFrom]);
      redraw = true;
    }
  }

  if (isPawn && move.to.rank === lastRank(piece.owner)) {
    next.pendingPromotion = true;
  }

  next.turn = opponentOf(state.turn);
  return { ok: true, state: next, redraw };
}
