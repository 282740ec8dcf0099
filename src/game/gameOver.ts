import { opponentOf, type Player } from "../types.ts";
import { listPieces } from "./board.ts";
import { hasAnyLegalMove, isKingInCheck } from "./movegen.ts";
import type { MoveHistory } from "./moveHistory.ts";
import { isThreefoldRepetition } from "./repetition.ts";
import type { GameState } from "./state.ts";

export type GameResult = "WhiteWins" | "BlackWins" | "Draw";

export type EndReason =
  | "Checkmate"
  | "Stalemate"
  | "Resignation"
  | "Agreement"
  | "InsufficientMaterial"
  | "FiftyMoveRule"
  | "ThreefoldRepetition";

export interface GameEnd {
  result: GameResult;
  reason: EndReason;
}

export const FIFTY_MOVE_LIMIT = 50;

export function winFor(player: Player, reason: EndReason): GameEnd {
  return { result: player === "W" ? "WhiteWins" : "BlackWins", reason };
}

export function draw(reason: EndReason): GameEnd {
  return { result: "Draw", reason };
}

function isInsufficientMaterial(state: GameState): boolean {
  const pieces = listPieces(state.board);
  // Bare kings: beyond the lone-minor rule, so K vs K does not run to the fifty-move draw.
  if (pieces.length === 2) return pieces.every(({ piece }) => piece.kind === "K");
  if (pieces.length !== 3) return false;
  const minors = pieces.filter(({ piece }) => piece.kind !== "K");
  return minors.length === 1 && (minors[0]?.piece.kind === "B" || minors[0]?.piece.kind === "N");
}

/**
 * Classifies the position after a completed move, or returns null when play
 * continues. Rules are tried in order and the first match wins.
 * Nothing is decided while a promotion is still pending.
 */
export function checkGameEnd(state: GameState, history: MoveHistory): GameEnd | null {
  if (state.pendingPromotion) return null;

  if (state.halfMoveClock >= FIFTY_MOVE_LIMIT) return draw("FiftyMoveRule");
  if (isThreefoldRepetition({ history, board: state.board })) return draw("ThreefoldRepetition");
  if (isInsufficientMaterial(state)) return draw("InsufficientMaterial");

  if (hasAnyLegalMove(state)) return null;

  // Side to move is stuck.
  if (isKingInCheck(state, state.turn)) return winFor(opponentOf(state.turn), "Checkmate");
  return draw("Stalemate");
}
