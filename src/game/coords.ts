export type BoardIndex = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7;

export const BOARD_INDICES: readonly BoardIndex[] = [0, 1, 2, 3, 4, 5, 6, 7];

/** Rank 0 is White's home rank, file 0 is the a-file. */
export interface Square {
  readonly rank: BoardIndex;
  readonly file: BoardIndex;
}

// Masks into 0..7 and maps through the table; never trusts the raw number.
export function toBoardIndex(value: number): BoardIndex {
  if (!Number.isInteger(value)) throw new Error(`Invalid board index: ${value}`);
  const masked = ((value % 8) + 8) % 8;
  const idx = BOARD_INDICES[masked];
  if (idx === undefined) throw new Error(`Invalid board index: ${value}`);
  return idx;
}

export function isBoardIndex(value: unknown): value is BoardIndex {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 && value < 8;
}

export function inBounds(rank: number, file: number): boolean {
  return rank >= 0 && rank < 8 && file >= 0 && file < 8;
}

export function makeSquare(rank: number, file: number): Square {
  return { rank: toBoardIndex(rank), file: toBoardIndex(file) };
}

export function sameSquare(a: Square, b: Square): boolean {
  return a.rank === b.rank && a.file === b.file;
}

export function squareIndex(sq: Square): number {
  return sq.rank * 8 + sq.file;
}

export function squareFromIndex(index: number): Square {
  if (!Number.isInteger(index) || index < 0 || index >= 64) throw new Error(`Invalid square index: ${index}`);
  return makeSquare(Math.floor(index / 8), index % 8);
}

export const ALL_SQUARES: readonly Square[] = Array.from({ length: 64 }, (_, i) => squareFromIndex(i));
