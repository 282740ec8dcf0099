import { describe, it, expect } from "vitest";
import { Chess } from "chess.js";
import { applyMove } from "./applyMove.ts";
import { setPiece } from "./board.ts";
import { sq, squareToA1 } from "./coordFormat.ts";
import { InvariantError } from "./errors.ts";
import { parseFen } from "./fen.ts";
import {
  generateLegalMoves,
  hasAnyLegalMove,
  isKingInCheck,
  isLegalMove,
  isPseudoLegalMove,
  isSquareAttacked,
} from "./movegen.ts";
import { createInitialGameState } from "./state.ts";

function engineMoves(fen: string): string[] {
  return generateLegalMoves(parseFen(fen))
    .map((m) => `${squareToA1(m.from)}${squareToA1(m.to)}`)
    .sort();
}

// Promotions show up once per piece kind there, once here.
function referenceMoves(fen: string): string[] {
  const chess = new Chess(fen);
  const pairs = new Set(chess.moves({ verbose: true }).map((m) => `${m.from}${m.to}`));
  return [...pairs].sort();
}

describe("movegen", () => {
  it("gives White twenty moves from the start and nothing to Black", () => {
    const state = createInitialGameState();
    const moves = generateLegalMoves(state);
    expect(moves).toHaveLength(20);
    expect(isLegalMove(state, { from: sq("e7"), to: sq("e5") })).toBe(false);
    expect(isLegalMove({ ...state, turn: "B" }, { from: sq("e7"), to: sq("e5") })).toBe(true);
  });

  it("blocks sliders and lets knights jump", () => {
    const state = createInitialGameState();
    expect(isPseudoLegalMove(state, { from: sq("a1"), to: sq("a3") })).toBe(false);
    expect(isPseudoLegalMove(state, { from: sq("c1"), to: sq("e3") })).toBe(false);
    expect(isPseudoLegalMove(state, { from: sq("b1"), to: sq("c3") })).toBe(true);
    expect(isPseudoLegalMove(state, { from: sq("b1"), to: sq("d2") })).toBe(false);
    expect(isPseudoLegalMove(state, { from: sq("e2"), to: sq("e2") })).toBe(false);
  });

  it("keeps a pinned piece in place", () => {
    const fen = "4k3/4r3/8/8/8/8/4B3/4K3 w - - 0 1";
    const state = parseFen(fen);
    expect(isPseudoLegalMove(state, { from: sq("e2"), to: sq("d3") })).toBe(true);
    expect(isLegalMove(state, { from: sq("e2"), to: sq("d3") })).toBe(false);
    expect(engineMoves(fen)).toEqual(["e1d1", "e1d2", "e1f1", "e1f2"]);
  });

  it("treats pawn diagonals, not pushes, as attacks", () => {
    const state = createInitialGameState();
    expect(isSquareAttacked(state, sq("d3"), "W")).toBe(true);
    expect(isSquareAttacked(state, sq("e4"), "W")).toBe(false);
    expect(isSquareAttacked(state, sq("f6"), "B")).toBe(true);
    // Defended pieces count as attacked.
    expect(isSquareAttacked(state, sq("e2"), "W")).toBe(true);
  });

  it("finds checks and refuses a kingless side", () => {
    const state = parseFen("4k3/8/8/8/8/8/4r3/4K3 w - - 0 1");
    expect(isKingInCheck(state, "W")).toBe(true);
    expect(isKingInCheck(state, "B")).toBe(false);
    expect(engineMoves("4k3/8/8/8/8/8/4r3/4K3 w - - 0 1")).toEqual(["e1d1", "e1e2", "e1f1"]);

    const noKing = createInitialGameState();
    setPiece(noKing.board, sq("e1"), null);
    expect(() => isKingInCheck(noKing, "W")).toThrow(InvariantError);
  });

  it("reports when the side to move is stuck", () => {
    expect(hasAnyLegalMove(createInitialGameState())).toBe(true);
    expect(hasAnyLegalMove(parseFen("k7/1R6/1K6/8/8/8/8/8 b - - 0 1"))).toBe(false);
  });

  describe("castling", () => {
    it("allows both sides when the path is clear and safe", () => {
      const state = parseFen("r3k2r/8/8/8/8/8/8/R3K2R w KQkq - 0 1");
      expect(isLegalMove(state, { from: sq("e1"), to: sq("g1") })).toBe(true);
      expect(isLegalMove(state, { from: sq("e1"), to: sq("c1") })).toBe(true);
    });

    it("refuses to cross an attacked square", () => {
      const state = parseFen("r3kr2/8/8/8/8/8/8/R3K2R w KQq - 0 1");
      expect(isLegalMove(state, { from: sq("e1"), to: sq("g1") })).toBe(false);
      expect(isLegalMove(state, { from: sq("e1"), to: sq("c1") })).toBe(true);
    });

    it("ignores an attack on b1", () => {
      const state = parseFen("1r2k3/8/8/8/8/8/8/R3K3 w Q - 0 1");
      expect(isLegalMove(state, { from: sq("e1"), to: sq("c1") })).toBe(true);
    });

    it("refuses out of check or after the pieces moved", () => {
      const inCheck = parseFen("4k3/4r3/8/8/8/8/8/R3K2R w KQ - 0 1");
      expect(isLegalMove(inCheck, { from: sq("e1"), to: sq("g1") })).toBe(false);
      expect(isLegalMove(inCheck, { from: sq("e1"), to: sq("c1") })).toBe(false);

      const rookMoved = parseFen("4k3/8/8/8/8/8/8/R3K2R w Q - 0 1");
      expect(isLegalMove(rookMoved, { from: sq("e1"), to: sq("g1") })).toBe(false);
      expect(isLegalMove(rookMoved, { from: sq("e1"), to: sq("c1") })).toBe(true);

      const blocked = parseFen("4k3/8/8/8/8/8/8/RN2K2R w KQ - 0 1");
      expect(isLegalMove(blocked, { from: sq("e1"), to: sq("c1") })).toBe(false);
    });

    it("stays lost after the king walks back home", () => {
      let state = parseFen("r3k2r/8/8/8/8/8/8/R3K2R w KQkq - 0 1");
      for (const [from, to] of [
        ["e1", "f1"],
        ["a8", "b8"],
        ["f1", "e1"],
        ["b8", "a8"],
      ] as const) {
        const outcome = applyMove(state, { from: sq(from), to: sq(to) });
        if (!outcome.ok) throw outcome.error;
        state = outcome.state;
      }
      expect(isLegalMove(state, { from: sq("e1"), to: sq("g1") })).toBe(false);
      expect(isLegalMove(state, { from: sq("e1"), to: sq("c1") })).toBe(false);
      expect(isLegalMove({ ...state, turn: "B" }, { from: sq("e8"), to: sq("g8") })).toBe(true);
      expect(isLegalMove({ ...state, turn: "B" }, { from: sq("e8"), to: sq("c8") })).toBe(false);
    });
  });

  describe("en passant", () => {
    const fen = "rnbqkbnr/ppp1p1pp/8/3pPp2/8/8/PPPP1PPP/RNBQKBNR w KQkq f6 0 3";

    it("captures only on the file that just double-pushed", () => {
      const state = parseFen(fen);
      expect(isLegalMove(state, { from: sq("e5"), to: sq("f6") })).toBe(true);
      expect(isLegalMove(state, { from: sq("e5"), to: sq("d6") })).toBe(false);
    });

    it("expires after any other move", () => {
      let state = parseFen(fen);
      for (const [from, to] of [
        ["b1", "c3"],
        ["b8", "c6"],
      ] as const) {
        const outcome = applyMove(state, { from: sq(from), to: sq(to) });
        if (!outcome.ok) throw outcome.error;
        state = outcome.state;
      }
      expect(state.enPassantFile).toBeNull();
      expect(isLegalMove(state, { from: sq("e5"), to: sq("f6") })).toBe(false);
    });

    it("is refused when lifting the victim exposes the king", () => {
      const state = parseFen("8/8/8/KPp4r/8/8/8/7k w - c6 0 1");
      expect(isPseudoLegalMove(state, { from: sq("b5"), to: sq("c6") })).toBe(true);
      expect(isLegalMove(state, { from: sq("b5"), to: sq("c6") })).toBe(false);
    });
  });

  describe("agrees with a reference move generator", () => {
    const positions = [
      "rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1",
      "r3k2r/pppq1ppp/2npbn2/2b1p3/2B1P3/2NPBN2/PPPQ1PPP/R3K2R w KQkq - 4 8",
      "r3k2r/pppq1ppp/2npbn2/2b1p3/2B1P3/2NPBN2/PPPQ1PPP/R3K2R b KQkq - 4 8",
      "rnbqkbnr/ppp1p1pp/8/3pPp2/8/8/PPPP1PPP/RNBQKBNR w KQkq f6 0 3",
      "8/P5k1/8/8/8/8/6Kp/8 w - - 0 1",
      "8/P5k1/8/8/8/8/6Kp/8 b - - 0 1",
      "r1bqkb1r/pppp1ppp/2n2n2/4p2Q/2B1P3/8/PPPP1PPP/RNB1K1NR w KQkq - 4 4",
      "4k3/8/8/8/8/8/4r3/4K3 w - - 0 1",
    ];

    for (const fen of positions) {
      it(fen, () => {
        expect(engineMoves(fen)).toEqual(referenceMoves(fen));
      });
    }
  });
});
