import { isPromotionKind, opponentOf, type PieceKind, type Player, type PromotionKind } from "../types.ts";
import { getPiece, setPiece } from "./board.ts";
import { makeSquare, type Square } from "./coords.ts";
import { InvalidPromotionError, InvariantError } from "./errors.ts";
import { lastRank } from "./initialPosition.ts";
import { cloneGameState, type GameState } from "./state.ts";

export type PromotionOutcome =
  | { ok: true; state: GameState; square: Square; kind: PromotionKind }
  | { ok: false; error: InvalidPromotionError };

/** The side owing a promotion is the one that just moved. */
export function promotingPlayer(state: GameState): Player | null {
  return state.pendingPromotion ? opponentOf(state.turn) : null;
}

export function findPromotionSquare(state: GameState): Square | null {
  const player = promotingPlayer(state);
  if (!player) return null;
  const rank = lastRank(player);
  for (let file = 0; file < 8; file++) {
    const sq = makeSquare(rank, file);
    const p = getPiece(state.board, sq);
    if (p && p.owner === player && p.kind === "P") return sq;
  }
  return null;
}

/**
 * Replaces the waiting pawn with `kind` and resumes play.
 * The turn already passed to the opponent when the pawn moved.
 */
export function promote(state: GameState, kind: PieceKind): PromotionOutcome {
  if (!state.pendingPromotion) {
    return { ok: false, error: new InvalidPromotionError("No promotion pending") };
  }
  if (!isPromotionKind(kind)) {
    return { ok: false, error: new InvalidPromotionError(`Cannot promote to ${kind}`) };
  }

  const square = findPromotionSquare(state);
  if (!square) throw new InvariantError("Promotion pending but no pawn on the last rank");

  const next = cloneGameState(state);
  setPiece(next.board, square, { owner: opponentOf(state.turn), kind });
  next.pendingPromotion = false;
  return { ok: true, state: next, square, kind };
}
