import type { Piece } from "../types";
import type { Coord } from "./board";

export interface MoveDetail {
  to: Coord;
  capture: boolean;
  /** Square of the piece a Runner jumps over; null for every other move. */
  jumped: Coord | null;
}

export interface MoveOutcome {
  piece: Piece;
  from: Coord;
  to: Coord;
  captured: Piece | null;
  gameOver: boolean;
}
