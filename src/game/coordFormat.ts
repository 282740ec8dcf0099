import { makeSquare, type Square } from "./coords.ts";

const SQUARE_RE = /^(?<file>[a-h])(?<rank>[1-8])$/;

export function parseSquare(text: string): Square | null {
  const match = SQUARE_RE.exec(text.trim().toLowerCase());
  if (!match || !match.groups) return null;

  const file = match.groups.file.charCodeAt(0) - "a".charCodeAt(0);
  const rank = Number(match.groups.rank) - 1;
  return makeSquare(rank, file);
}

export function squareToA1(sq: Square): string {
  const fileLetter = String.fromCharCode("a".charCodeAt(0) + sq.file);
  return `${fileLetter}${sq.rank + 1}`;
}

/** Test/fixture helper; throws on bad input. */
export function sq(text: string): Square {
  const parsed = parseSquare(text);
  if (!parsed) throw new Error(`Invalid square: ${text}`);
  return parsed;
}
