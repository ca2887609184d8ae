import type { Coord } from "./game/board";
import type { MoveDetail } from "./game/move";

export type PlayerColor = "white" | "black";

export type PieceType = "runner" | "leaper" | "royal";

export type GamePhase = "in-progress" | "completed";

export interface Piece {
  readonly type: PieceType;
  readonly color: PlayerColor;
}

export type Square = Piece | null;

export interface BoardState {
  width: number;
  height: number;
  grid: Square[][];
}

export interface GameState {
  board: BoardState;
  phase: GamePhase;
  turn: PlayerColor;
  selected: Coord | null;
  selectedMoves: MoveDetail[] | null;
  winner?: PlayerColor;
}

export type EngineErrorCode =
  | "invalid_format"
  | "out_of_range"
  | "no_piece"
  | "wrong_color"
  | "illegal_destination"
  | "same_square"
  | "game_over";

export interface ValidationError {
  ok: false;
  code: EngineErrorCode;
  error: string;
}

export interface ValidationSuccess<T> {
  ok: true;
  value: T;
}

export type ValidationResult<T> = ValidationError | ValidationSuccess<T>;

export const capitalize = (value: string): string => value.charAt(0).toUpperCase() + value.slice(1);

export const opponentOf = (color: PlayerColor): PlayerColor => (color === "white" ? "black" : "white");

export const fail = (code: EngineErrorCode, error: string): ValidationError => ({ ok: false, code, error });

export const succeed = <T>(value: T): ValidationSuccess<T> => ({ ok: true, value });
