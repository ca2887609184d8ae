import { LEAPER_OFFSETS, RUNNER_MAX_DISTANCE } from "./constants";
import { formatSquare } from "./notation";
import { capitalize, fail, succeed } from "../types";
import type { BoardState, Piece, PieceType, PlayerColor, Square, ValidationResult } from "../types";
import type { MoveDetail } from "./move";

export interface Coord {
  row: number;
  col: number;
}

export type CoordKey = `${number},${number}`;

type Offset = readonly [number, number];

export const coordKey = (coord: Coord): CoordKey => `${coord.row},${coord.col}`;

export const isInsideBoard = (board: BoardState, coord: Coord): boolean =>
  coord.row >= 0 && coord.row < board.height && coord.col >= 0 && coord.col < board.width;

export const equalCoord = (a: Coord | null | undefined, b: Coord | null | undefined): boolean => {
  if (!a || !b) return false;
  return a.row === b.row && a.col === b.col;
};

export const describePiece = (piece: Piece): string =>
  `${capitalize(piece.color)} ${capitalize(piece.type)}`;

const HOME_ROW_ORDER: PieceType[] = ["royal", "runner", "leaper"];

export const createBoard = (width: number, height: number): BoardState => {
  const grid: Square[][] = Array.from({ length: height }, () =>
    Array.from({ length: width }, (): Square => null)
  );

  // Black mirrors White through the centre: top row, filled from the right.
  HOME_ROW_ORDER.forEach((type, index) => {
    if (width <= index) return;
    grid[0][index] = { type, color: "white" };
    grid[height - 1][width - 1 - index] = { type, color: "black" };
  });

  return { width, height, grid };
};

export const getPiece = (board: BoardState, coord: Coord): Piece | null => {
  if (!isInsideBoard(board, coord)) return null;
  return board.grid[coord.row][coord.col];
};

export const countPieces = (board: BoardState, color: PlayerColor, type?: PieceType): number =>
  board.grid
    .flat()
    .filter((square) => square !== null && square.color === color && (!type || square.type === type)).length;

const compassDirections = (): Offset[] => {
  const result: Offset[] = [];
  for (let dRow = -1; dRow <= 1; dRow += 1) {
    for (let dCol = -1; dCol <= 1; dCol += 1) {
      if (dRow === 0 && dCol === 0) continue;
      result.push([dRow, dCol]);
    }
  }
  return result;
};

const COMPASS_DIRECTIONS = compassDirections();

export const getLegalMoves = (board: BoardState, from: Coord, piece: Piece): MoveDetail[] => {
  switch (piece.type) {
    case "royal":
      return landingMoves(board, from, piece, COMPASS_DIRECTIONS);
    case "leaper":
      return landingMoves(board, from, piece, LEAPER_OFFSETS);
    case "runner":
      return runnerMoves(board, from, piece);
  }
};

/** Single-hop moves that capture by landing on an opposing piece. */
const landingMoves = (
  board: BoardState,
  from: Coord,
  piece: Piece,
  offsets: ReadonlyArray<Offset>
): MoveDetail[] => {
  const moves: MoveDetail[] = [];
  for (const [dRow, dCol] of offsets) {
    const to: Coord = { row: from.row + dRow, col: from.col + dCol };
    if (!isInsideBoard(board, to)) continue;
    const occupant = getPiece(board, to);
    if (!occupant) {
      moves.push({ to, capture: false, jumped: null });
    } else if (occupant.color !== piece.color) {
      moves.push({ to, capture: true, jumped: null });
    }
  }
  return moves;
};

const runnerMoves = (board: BoardState, from: Coord, piece: Piece): MoveDetail[] => {
  const moves: MoveDetail[] = [];

  for (const [dRow, dCol] of COMPASS_DIRECTIONS) {
    for (let distance = 1; distance <= RUNNER_MAX_DISTANCE; distance += 1) {
      const to: Coord = { row: from.row + dRow * distance, col: from.col + dCol * distance };
      if (!isInsideBoard(board, to)) break;
      // Runners only land on empty squares, but may still reach past an occupied one.
      if (getPiece(board, to)) continue;

      let jumped: Coord | null = null;
      let blocked = false;
      for (let step = 1; step < distance; step += 1) {
        const square: Coord = { row: from.row + dRow * step, col: from.col + dCol * step };
        const occupant = getPiece(board, square);
        if (!occupant) continue;
        // A friendly piece or a second opponent on the path rules out this distance only.
        if (occupant.color === piece.color || jumped) {
          blocked = true;
          break;
        }
        jumped = square;
      }

      if (blocked) continue;
      moves.push({ to, capture: jumped !== null, jumped });
    }
  }

  return moves;
};

export const movePiece = (
  board: BoardState,
  from: Coord,
  to: Coord,
  mover: PlayerColor,
  legalMoves: MoveDetail[]
): ValidationResult<Piece | null> => {
  const piece = getPiece(board, from);
  if (!piece) {
    return fail("no_piece", `Invalid move: There is no piece at ${formatSquare(from)}.`);
  }
  if (piece.color !== mover) {
    return fail("wrong_color", "Invalid move: You can't move your opponent's piece.");
  }
  if (equalCoord(from, to)) {
    return fail("same_square", "Invalid move: Destination must be different from origin.");
  }

  const move = legalMoves.find((candidate) => equalCoord(candidate.to, to));
  if (!move) {
    return fail(
      "illegal_destination",
      `Invalid move: ${describePiece(piece)} can't move to ${formatSquare(to)}.`
    );
  }

  board.grid[from.row][from.col] = null;
  let captured: Piece | null = null;
  if (move.capture) {
    // Runners take the piece they jump over; everything else takes the destination.
    const target = move.jumped ?? move.to;
    captured = board.grid[target.row][target.col];
    board.grid[target.row][target.col] = null;
  }
  board.grid[to.row][to.col] = piece;

  return succeed(captured);
};
