import type { Square } from "./coords.ts";

export interface Move {
  from: Square;
  to: Square;
}
