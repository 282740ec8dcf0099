import { describe, it, expect } from "vitest";
import { applyMove } from "./applyMove.ts";
import { boardsEqual, getPiece } from "./board.ts";
import { compactBoard } from "./compactBoard.ts";
import { sq } from "./coordFormat.ts";
import { InvalidMoveError } from "./errors.ts";
import { parseFen } from "./fen.ts";
import { createInitialGameState, type GameState } from "./state.ts";

function play(state: GameState, from: string, to: string): GameState {
  const outcome = applyMove(state, { from: sq(from), to: sq(to) });
  if (!outcome.ok) throw outcome.error;
  return outcome.state;
}

describe("applyMove", () => {
  it("moves a pawn two squares and opens en passant on its file", () => {
    const before = createInitialGameState();
    const outcome = applyMove(before, { from: sq("e2"), to: sq("e4") });
    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;

    expect(getPiece(outcome.state.board, sq("e4"))).toEqual({ owner: "W", kind: "P" });
    expect(getPiece(outcome.state.board, sq("e2"))).toBeNull();
    expect(outcome.state.turn).toBe("B");
    expect(outcome.state.enPassantFile).toBe(4);
    expect(outcome.state.halfMoveClock).toBe(0);
    expect(outcome.redraw).toBe(false);

    // Input state must not be mutated.
    expect(getPiece(before.board, sq("e2"))).toEqual({ owner: "W", kind: "P" });
    expect(before.turn).toBe("W");
  });

  it("rejects illegal moves and leaves the state alone", () => {
    const before = createInitialGameState();
    const snapshot = compactBoard(before.board);

    for (const [from, to] of [
      ["e2", "e5"],
      ["e7", "e5"],
      ["d4", "d5"],
    ] as const) {
      const outcome = applyMove(before, { from: sq(from), to: sq(to) });
      expect(outcome.ok).toBe(false);
      if (outcome.ok) continue;
      expect(outcome.error).toBeInstanceOf(InvalidMoveError);
      expect(outcome.error.code).toBe("INVALID_MOVE");
    }
    expect(compactBoard(before.board)).toEqual(snapshot);
    expect(before.turn).toBe("W");
  });

  it("counts quiet half-moves and resets on pawn moves and captures", () => {
    let state = play(createInitialGameState(), "g1", "f3");
    expect(state.halfMoveClock).toBe(1);
    expect(state.enPassantFile).toBeNull();
    state = play(state, "b8", "c6");
    expect(state.halfMoveClock).toBe(2);
    state = play(state, "e2", "e4");
    expect(state.halfMoveClock).toBe(0);
    state = play(state, "c6", "d4");
    state = play(state, "f3", "d4");
    expect(state.halfMoveClock).toBe(0);
    expect(getPiece(state.board, sq("d4"))).toEqual({ owner: "W", kind: "N" });
  });

  it("castles king side and moves the rook", () => {
    const outcome = applyMove(parseFen("r3k2r/8/8/8/8/8/8/R3K2R w KQkq - 0 1"), { from: sq("e1"), to: sq("g1") });
    if (!outcome.ok) throw outcome.error;
    const { state } = outcome;

    expect(getPiece(state.board, sq("g1"))).toEqual({ owner: "W", kind: "K" });
    expect(getPiece(state.board, sq("f1"))).toEqual({ owner: "W", kind: "R" });
    expect(getPiece(state.board, sq("h1"))).toBeNull();
    expect(state.whiteKingMoved).toBe(true);
    expect(state.whiteHRookMoved).toBe(true);
    expect(state.whiteARookMoved).toBe(false);
    expect(state.halfMoveClock).toBe(1);
    expect(outcome.redraw).toBe(true);
  });

  it("castles queen side for Black", () => {
    const state = play(parseFen("r3k2r/8/8/8/8/8/8/R3K2R b KQkq - 0 1"), "e8", "c8");
    expect(getPiece(state.board, sq("c8"))).toEqual({ owner: "B", kind: "K" });
    expect(getPiece(state.board, sq("d8"))).toEqual({ owner: "B", kind: "R" });
    expect(getPiece(state.board, sq("a8"))).toBeNull();
    expect(state.blackKingMoved).toBe(true);
    expect(state.blackARookMoved).toBe(true);
    expect(state.blackHRookMoved).toBe(false);
  });

  it("removes the pawn taken en passant", () => {
    const outcome = applyMove(parseFen("rnbqkbnr/ppp1p1pp/8/3pPp2/8/8/PPPP1PPP/RNBQKBNR w KQkq f6 0 3"), {
      from: sq("e5"),
      to: sq("f6"),
    });
    if (!outcome.ok) throw outcome.error;

    expect(getPiece(outcome.state.board, sq("f6"))).toEqual({ owner: "W", kind: "P" });
    expect(getPiece(outcome.state.board, sq("f5"))).toBeNull();
    expect(getPiece(outcome.state.board, sq("e5"))).toBeNull();
    expect(outcome.state.halfMoveClock).toBe(0);
    expect(outcome.redraw).toBe(true);
  });

  it("loses castling rights when a rook is captured on its corner", () => {
    const state = play(parseFen("r3k2r/8/8/8/8/8/8/R3K2R w KQkq - 0 1"), "h1", "h8");
    expect(state.whiteHRookMoved).toBe(true);
    expect(state.blackHRookMoved).toBe(true);
    expect(state.blackARookMoved).toBe(false);
    expect(state.halfMoveClock).toBe(0);
  });

  it("restores the board on reversed moves but keeps the flags", () => {
    const start = parseFen("r3k2r/8/8/8/8/8/8/R3K2R w KQkq - 0 1");
    let state = play(start, "h1", "h2");
    state = play(state, "h8", "h7");
    state = play(state, "h2", "h1");
    state = play(state, "h7", "h8");

    expect(boardsEqual(state.board, start.board)).toBe(true);
    expect(state.whiteHRookMoved).toBe(true);
    expect(state.blackHRookMoved).toBe(true);
    expect(state.halfMoveClock).toBe(4);
  });

  it("waits for a promotion before anything else moves", () => {
    const state = play(parseFen("8/P5k1/8/8/8/8/6K1/8 w - - 0 1"), "a7", "a8");
    expect(state.pendingPromotion).toBe(true);
    expect(state.turn).toBe("B");
    expect(getPiece(state.board, sq("a8"))).toEqual({ owner: "W", kind: "P" });

    const outcome = applyMove(state, { from: sq("g7"), to: sq("g6") });
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.message).toBe("Promotion pending");
  });
});
