import type { Board } from "./board.ts";
import { compactBoard, compactBoardsEqual, type CompactBoard } from "./compactBoard.ts";

/**
 * Compact board snapshots, one per completed move, for repetition checks.
 * Lives and dies with its game.
 */
export class MoveHistory {
  private snapshots: CompactBoard[] = [];

  /** Record the board after a completed move. */
  push(board: Board): CompactBoard {
    const snap = compactBoard(board);
    this.snapshots.push(snap);
    return snap;
  }

  /** How many recorded snapshots are bit-identical to `snap`. */
  occurrences(snap: CompactBoard): number {
    let count = 0;
    for (const s of this.snapshots) {
      if (compactBoardsEqual(s, snap)) count++;
    }
    return count;
  }

  size(): number {
    return this.snapshots.length;
  }
}
