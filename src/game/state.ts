import type { Player } from "../types.ts";
import { cloneBoard, type Board } from "./board.ts";
import type { BoardIndex } from "./coords.ts";
import { createStartingBoard } from "./initialPosition.ts";

/** Once set, a castling flag is never cleared. */
export interface CastlingFlags {
  whiteKingMoved: boolean;
  blackKingMoved: boolean;
  whiteARookMoved: boolean;
  blackARookMoved: boolean;
  whiteHRookMoved: boolean;
  blackHRookMoved: boolean;
}

export interface GameState extends CastlingFlags {
  board: Board;
  turn: Player;
  /** File of a pawn that just advanced two squares; null after any other move. */
  enPassantFile: BoardIndex | null;
  /** Half-moves since the last capture or pawn move. */
  halfMoveClock: number;
  /** A pawn stands on its last rank and play waits for `promote`. */
  pendingPromotion: boolean;
}

export const NO_CASTLING_MOVED: CastlingFlags = {
  whiteKingMoved: false,
  blackKingMoved: false,
  whiteARookMoved: false,
  blackARookMoved: false,
  whiteHRookMoved: false,
  blackHRookMoved: false,
};

export function createInitialGameState(): GameState {
  return {
    board: createStartingBoard(),
    turn: "W",
    enPassantFile: null,
    halfMoveClock: 0,
    ...NO_CASTLING_MOVED,
    pendingPromotion: false,
  };
}

export function cloneGameState(state: GameState): GameState {
  return { ...state, board: cloneBoard(state.board) };
}

export function kingMoved(state: CastlingFlags, player: Player): boolean {
  return player === "W" ? state.whiteKingMoved : state.blackKingMoved;
}

export function rookMoved(state: CastlingFlags, player: Player, side: "kingSide" | "queenSide"): boolean {
  if (player === "W") return side === "kingSide" ? state.whiteHRookMoved : state.whiteARookMoved;
  return side === "kingSide" ? state.blackHRookMoved : state.blackARookMoved;
}
