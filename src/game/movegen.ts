import { opponentOf, playerName, type Player } from "../types.ts";
import { cloneBoard, findKing, getPiece, isEmpty, setPiece, type Board } from "./board.ts";
import { ALL_SQUARES, makeSquare, sameSquare, type Square } from "./coords.ts";
import { InvariantError } from "./errors.ts";
import { homeRank, pawnRank } from "./initialPosition.ts";
import type { Move } from "./moveTypes.ts";
import { kingMoved, rookMoved, type GameState } from "./state.ts";

export type CastlingSide = "kingSide" | "queenSide";

type PseudoLegalOpts = {
  /** Off when probing attacks: castling never captures, and its own attack test would recurse. */
  allowCastling: boolean;
};

const WITH_CASTLING: PseudoLegalOpts = { allowCastling: true };
const ATTACKS_ONLY: PseudoLegalOpts = { allowCastling: false };

function canLandOn(board: Board, to: Square, player: Player): boolean {
  const target = getPiece(board, to);
  return !target || target.owner !== player;
}

/** Every square strictly between `from` and `to` (same rank, file or diagonal) is empty. */
function isPathClear(board: Board, from: Square, to: Square): boolean {
  const dr = Math.sign(to.rank - from.rank);
  const df = Math.sign(to.file - from.file);
  let r = from.rank + dr;
  let f = from.file + df;
  while (r !== to.rank || f !== to.file) {
    if (!isEmpty(board, makeSquare(r, f))) return false;
    r += dr;
    f += df;
  }
  return true;
}

function isRookMove(board: Board, move: Move, player: Player): boolean {
  if (move.from.rank !== move.to.rank && move.from.file !== move.to.file) return false;
  return isPathClear(board, move.from, move.to) && canLandOn(board, move.to, player);
}

function isBishopMove(board: Board, move: Move, player: Player): boolean {
  const dr = Math.abs(move.to.rank - move.from.rank);
  const df = Math.abs(move.to.file - move.from.file);
  if (dr !== df || dr === 0) return false;
  return isPathClear(board, move.from, move.to) && canLandOn(board, move.to, player);
}

function isKnightMove(board: Board, move: Move, player: Player): boolean {
  const dr = Math.abs(move.to.rank - move.from.rank);
  const df = Math.abs(move.to.file - move.from.file);
  if (!((dr === 1 && df === 2) || (dr === 2 && df === 1))) return false;
  return canLandOn(board, move.to, player);
}

function isPawnMove(state: GameState, move: Move, player: Player): boolean {
  const { board } = state;
  const dir = player === "W" ? 1 : -1;
  const dr = move.to.rank - move.from.rank;
  const df = move.to.file - move.from.file;
  const target = getPiece(board, move.to);

  if (df === 0) {
    if (dr === dir) return target === null;
    if (dr === 2 * dir && move.from.rank === pawnRank(player)) {
      return target === null && isEmpty(board, makeSquare(move.from.rank + dir, move.from.file));
    }
    return false;
  }

  if (Math.abs(df) !== 1 || dr !== dir) return false;
  if (target) return target.owner !== player;

  // En passant: the double-pushed pawn sits beside us, we land behind it.
  if (state.enPassantFile !== move.to.file) return false;
  const captureFromRank = player === "W" ? 4 : 3;
  if (move.from.rank !== captureFromRank) return false;
  const victim = getPiece(board, makeSquare(move.from.rank, move.to.file));
  return victim !== null && victim.owner !== player && victim.kind === "P";
}

export function castlingSideOf(move: Move, player: Player): CastlingSide | null {
  const rank = homeRank(player);
  if (move.from.rank !== rank || move.to.rank !== rank || move.from.file !== 4) return null;
  if (move.to.file === 6) return "kingSide";
  if (move.to.file === 2) return "queenSide";
  return null;
}

function isCastlingAllowed(state: GameState, move: Move, player: Player): boolean {
  const side = castlingSideOf(move, player);
  if (!side) return false;
  if (kingMoved(state, player) || rookMoved(state, player, side)) return false;

  const rank = homeRank(player);
  const rook = getPiece(state.board, makeSquare(rank, side === "kingSide" ? 7 : 0));
  if (!rook || rook.owner !== player || rook.kind !== "R") return false;

  const between = side === "kingSide" ? [5, 6] : [1, 2, 3];
  if (!between.every((file) => isEmpty(state.board, makeSquare(rank, file)))) return false;

  // Start, path and destination must all be safe.
  const kingPath = side === "kingSide" ? [4, 5, 6] : [4, 3, 2];
  const opponent = opponentOf(player);
  return kingPath.every((file) => !isSquareAttacked(state, makeSquare(rank, file), opponent));
}

function isKingMove(state: GameState, move: Move, player: Player, opts: PseudoLegalOpts): boolean {
  const dr = Math.abs(move.to.rank - move.from.rank);
  const df = Math.abs(move.to.file - move.from.file);
  if (dr <= 1 && df <= 1) return canLandOn(state.board, move.to, player);
  if (opts.allowCastling && dr === 0 && df === 2) return isCastlingAllowed(state, move, player);
  return false;
}

function isPseudoLegal(state: GameState, move: Move, opts: PseudoLegalOpts): boolean {
  if (sameSquare(move.from, move.to)) return false;
  const piece = getPiece(state.board, move.from);
  if (!piece || piece.owner !== state.turn) return false;

  const player = piece.owner;
  switch (piece.kind) {
    case "K":
      return isKingMove(state, move, player, opts);
    case "Q":
      return isRookMove(state.board, move, player) || isBishopMove(state.board, move, player);
    case "R":
      return isRookMove(state.board, move, player);
    case "B":
      return isBishopMove(state.board, move, player);
    case "N":
      return isKnightMove(state.board, move, player);
    case "P":
      return isPawnMove(state, move, player);
  }
}

/** Obeys the moving piece's pattern and board occupancy; ignores own-king safety. */
export function isPseudoLegalMove(state: GameState, move: Move): boolean {
  return isPseudoLegal(state, move, WITH_CASTLING);
}

/**
 * True when some piece of `by` has a pseudo-legal move onto `square`.
 *
 * The sweep runs with `by` to move. An empty square (or one holding a `by` piece)
 * gets an enemy probe first, so pawns count by their diagonals rather than their
 * pushes and defended pieces count as attacked.
 */
export function isSquareAttacked(state: GameState, square: Square, by: Player): boolean {
  const board = cloneBoard(state.board);
  const occupant = getPiece(board, square);
  if (!occupant || occupant.owner === by) setPiece(board, square, { owner: opponentOf(by), kind: "P" });

  const probe: GameState = { ...state, board, turn: by };
  for (const from of ALL_SQUARES) {
    const p = getPiece(board, from);
    if (!p || p.owner !== by) continue;
    if (isPseudoLegal(probe, { from, to: square }, ATTACKS_ONLY)) return true;
  }
  return false;
}

export function isKingInCheck(state: GameState, player: Player): boolean {
  const king = findKing(state.board, player);
  if (!king) throw new InvariantError(`${playerName(player)} has no king`);
  return isSquareAttacked(state, king, opponentOf(player));
}

/**
 * Relocates the piece on a copy and asks whether the mover's king is attacked.
 * Castling rook moves are skipped; an en-passant victim is lifted.
 */
export function leavesKingInCheck(state: GameState, move: Move): boolean {
  const mover = getPiece(state.board, move.from);
  if (!mover) return false;

  const board = cloneBoard(state.board);
  if (mover.kind === "P" && move.from.file !== move.to.file && isEmpty(board, move.to)) {
    setPiece(board, makeSquare(move.from.rank, move.to.file), null);
  }
  setPiece(board, move.from, null);
  setPiece(board, move.to, mover);

  return isKingInCheck({ ...state, board }, mover.owner);
}

export function isLegalMove(state: GameState, move: Move): boolean {
  return isPseudoLegalMove(state, move) && !leavesKingInCheck(state, move);
}

/** Exhaustive 64×64 scan for the side to move. */
export function generateLegalMoves(state: GameState): Move[] {
  const out: Move[] = [];
  for (const from of ALL_SQUARES) {
    const p = getPiece(state.board, from);
    if (!p || p.owner !== state.turn) continue;
    for (const to of ALL_SQUARES) {
      const move = { from, to };
      if (isLegalMove(state, move)) out.push(move);
    }
  }
  return out;
}

export function hasAnyLegalMove(state: GameState): boolean {
  for (const from of ALL_SQUARES) {
    const p = getPiece(state.board, from);
    if (!p || p.owner !== state.turn) continue;
    for (const to of ALL_SQUARES) {
      if (isLegalMove(state, { from, to })) return true;
    }
  }
  return false;
}
