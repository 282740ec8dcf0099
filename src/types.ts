export type Player = "W" | "B";
export type PieceKind = "K" | "Q" | "R" | "N" | "B" | "P";

export interface Piece { readonly owner: Player; readonly kind: PieceKind; }

/** Kinds a pawn may turn into. */
export type PromotionKind = Exclude<PieceKind, "K" | "P">;

export const PIECE_KINDS: readonly PieceKind[] = ["K", "Q", "R", "N", "B", "P"];

export function opponentOf(p: Player): Player {
  return p === "W" ? "B" : "W";
}

export function playerName(p: Player): "White" | "Black" {
  return p === "W" ? "White" : "Black";
}

export function isPromotionKind(kind: PieceKind): kind is PromotionKind {
  return kind === "Q" || kind === "R" || kind === "N" || kind === "B";
}
