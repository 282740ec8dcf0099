import type { Board } from "./board.ts";
import { compactBoard } from "./compactBoard.ts";
import type { MoveHistory } from "./moveHistory.ts";

export const REPETITION_LIMIT = 3;

/**
 * True when the current placement already appears `REPETITION_LIMIT` times in
 * the history (the history includes the move that produced it). Only piece
 * placement counts; side to move and rights are ignored.
 */
export function isThreefoldRepetition(args: { history: MoveHistory; board: Board }): boolean {
  const { history, board } = args;
  return history.occurrences(compactBoard(board)) >= REPETITION_LIMIT;
}
