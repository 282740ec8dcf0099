import type { PieceKind, Player } from "../types.ts";
import { createEmptyBoard, getPiece, setPiece, type Board } from "./board.ts";
import { ALL_SQUARES, squareIndex } from "./coords.ts";

/** 64 squares, one nibble each. */
export const COMPACT_BOARD_BYTES = 32;

export type CompactBoard = Uint8Array;

const KIND_CODES: Record<PieceKind, number> = { K: 1, Q: 2, R: 3, N: 4, B: 5, P: 6 };
const KINDS_BY_CODE: ReadonlyArray<PieceKind | null> = [null, "K", "Q", "R", "N", "B", "P", null];
const BLACK_BIT = 0b1000;

function encodeSquare(owner: Player, kind: PieceKind): number {
  return KIND_CODES[kind] | (owner === "B" ? BLACK_BIT : 0);
}

/**
 * Packs the board: square `rank*8+file` lives in byte `index >> 1`, even
 * squares in the low nibble. Bits 0-2 hold the kind code, bit 3 is set for
 * Black, and an empty square is 0.
 */
export function compactBoard(board: Board): CompactBoard {
  const out = new Uint8Array(COMPACT_BOARD_BYTES);
  for (const sq of ALL_SQUARES) {
    const p = getPiece(board, sq);
    if (!p) continue;
    const idx = squareIndex(sq);
    const nibble = encodeSquare(p.owner, p.kind);
    out[idx >> 1] |= idx % 2 === 0 ? nibble : nibble << 4;
  }
  return out;
}

export function expandBoard(compact: CompactBoard): Board {
  if (compact.length !== COMPACT_BOARD_BYTES) {
    throw new Error(`Compact board must be ${COMPACT_BOARD_BYTES} bytes (got ${compact.length})`);
  }
  const board = createEmptyBoard();
  for (const sq of ALL_SQUARES) {
    const idx = squareIndex(sq);
    const byte = compact[idx >> 1] ?? 0;
    const nibble = idx % 2 === 0 ? byte & 0x0f : byte >> 4;
    if (nibble === 0) continue;
    const kind = KINDS_BY_CODE[nibble & 0b0111];
    if (!kind) throw new Error(`Invalid piece code ${nibble} at square ${idx}`);
    setPiece(board, sq, { owner: nibble & BLACK_BIT ? "B" : "W", kind });
  }
  return board;
}

export function compactBoardsEqual(a: CompactBoard, b: CompactBoard): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}
