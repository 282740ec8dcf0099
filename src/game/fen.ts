import type { Piece, PieceKind, Player } from "../types.ts";
import { createEmptyBoard, getPiece, setPiece } from "./board.ts";
import { parseSquare, squareToA1 } from "./coordFormat.ts";
import { makeSquare } from "./coords.ts";
import { homeRank, lastRank } from "./initialPosition.ts";
import type { GameState } from "./state.ts";

const FEN_KINDS: Record<string, PieceKind> = { k: "K", q: "Q", r: "R", n: "N", b: "B", p: "P" };

function pieceToFenChar(piece: Piece): string {
  return piece.owner === "W" ? piece.kind : piece.kind.toLowerCase();
}

function fenCharToPiece(ch: string): Piece | null {
  const kind = FEN_KINDS[ch.toLowerCase()];
  if (!kind) return null;
  return { owner: ch === ch.toUpperCase() ? "W" : "B", kind };
}

function hasPiece(state: GameState, rank: number, file: number, owner: Player, kind: PieceKind): boolean {
  const p = getPiece(state.board, makeSquare(rank, file));
  return p !== null && p.owner === owner && p.kind === kind;
}

function castlingField(state: GameState): string {
  let s = "";
  for (const player of ["W", "B"] as const) {
    const rank = homeRank(player);
    const kingMoved = player === "W" ? state.whiteKingMoved : state.blackKingMoved;
    const hMoved = player === "W" ? state.whiteHRookMoved : state.blackHRookMoved;
    const aMoved = player === "W" ? state.whiteARookMoved : state.blackARookMoved;
    if (kingMoved || !hasPiece(state, rank, 4, player, "K")) continue;
    const k = !hMoved && hasPiece(state, rank, 7, player, "R") ? "K" : "";
    const q = !aMoved && hasPiece(state, rank, 0, player, "R") ? "Q" : "";
    s += player === "W" ? k + q : (k + q).toLowerCase();
  }
  return s.length > 0 ? s : "-";
}

export function gameStateToFen(state: GameState, opts?: { fullmove?: number }): string {
  const rows: string[] = [];

  for (let rank = 7; rank >= 0; rank--) {
    let empties = 0;
    let row = "";
    for (let file = 0; file < 8; file++) {
      const piece = getPiece(state.board, makeSquare(rank, file));
      if (!piece) {
        empties++;
        continue;
      }
      if (empties > 0) {
        row += String(empties);
        empties = 0;
      }
      row += pieceToFenChar(piece);
    }
    if (empties > 0) row += String(empties);
    rows.push(row);
  }

  const side = state.turn === "W" ? "w" : "b";
  // The pawn that double-pushed belongs to the side that just moved.
  const ep =
    state.enPassantFile === null
      ? "-"
      : squareToA1(makeSquare(state.turn === "W" ? 5 : 2, state.enPassantFile));
  const fullmove = opts?.fullmove !== undefined && Number.isFinite(opts.fullmove) ? Math.max(1, Math.round(opts.fullmove)) : 1;

  return `${rows.join("/")} ${side} ${castlingField(state)} ${ep} ${state.halfMoveClock} ${fullmove}`;
}

/** Reads a FEN string. The fullmove number is accepted and ignored. */
export function parseFen(fen: string): GameState {
  const fields = fen.trim().split(/\s+/);
  const [placement, side, castling = "-", ep = "-", halfmove = "0"] = fields;
  if (!placement || !side) throw new Error(`Invalid FEN: ${fen}`);

  const rows = placement.split("/");
  if (rows.length !== 8) throw new Error(`Invalid FEN placement: ${placement}`);

  const board = createEmptyBoard();
  rows.forEach((row, i) => {
    const rank = 7 - i;
    let file = 0;
    for (const ch of row) {
      if (/[1-8]/.test(ch)) {
        file += Number(ch);
        continue;
      }
      const piece = fenCharToPiece(ch);
      if (!piece || file > 7) throw new Error(`Invalid FEN row: ${row}`);
      setPiece(board, makeSquare(rank, file), piece);
      file++;
    }
    if (file !== 8) throw new Error(`Invalid FEN row: ${row}`);
  });

  if (side !== "w" && side !== "b") throw new Error(`Invalid FEN side to move: ${side}`);

  let enPassantFile: GameState["enPassantFile"] = null;
  if (ep !== "-") {
    const epSquare = parseSquare(ep);
    if (!epSquare) throw new Error(`Invalid FEN en passant square: ${ep}`);
    enPassantFile = epSquare.file;
  }

  const halfMoveClock = Number(halfmove);
  if (!Number.isInteger(halfMoveClock) || halfMoveClock < 0) throw new Error(`Invalid FEN halfmove clock: ${halfmove}`);

  const state: GameState = {
    board,
    turn: side === "w" ? "W" : "B",
    enPassantFile,
    halfMoveClock,
    whiteKingMoved: !castling.includes("K") && !castling.includes("Q"),
    blackKingMoved: !castling.includes("k") && !castling.includes("q"),
    whiteARookMoved: !castling.includes("Q"),
    blackARookMoved: !castling.includes("q"),
    whiteHRookMoved: !castling.includes("K"),
    blackHRookMoved: !castling.includes("k"),
    pendingPromotion: false,
  };

  // A pawn left on its last rank means the mover still owes a promotion.
  const mover: Player = state.turn === "W" ? "B" : "W";
  for (let file = 0; file < 8; file++) {
    if (hasPiece(state, lastRank(mover), file, mover, "P")) state.pendingPromotion = true;
  }
  return state;
}
