import { createBoard, equalCoord, getLegalMoves, getPiece, movePiece } from "./board";
import { formatSquare } from "./notation";
import { capitalize, fail, opponentOf, succeed } from "../types";
import type { GameState, PlayerColor, ValidationResult } from "../types";
import type { Coord } from "./board";
import type { MoveDetail, MoveOutcome } from "./move";

const FIRST_PLAYER: PlayerColor = "white";

export const createGame = (width: number, height: number): GameState => ({
  board: createBoard(width, height),
  phase: "in-progress",
  turn: FIRST_PLAYER,
  selected: null,
  selectedMoves: null
});

export const restartGame = (state: GameState, width: number, height: number): void => {
  Object.assign(state, createGame(width, height));
  delete state.winner;
};

export const isGameOver = (state: GameState): boolean => state.phase === "completed";

export const clearSelection = (state: GameState): void => {
  state.selected = null;
  state.selectedMoves = null;
};

export const switchTurn = (state: GameState): void => {
  state.turn = opponentOf(state.turn);
  clearSelection(state);
};

export const selectPiece = (state: GameState, coord: Coord): ValidationResult<MoveDetail[]> => {
  if (isGameOver(state)) {
    return fail("game_over", "The game is over.");
  }

  const piece = getPiece(state.board, coord);
  if (!piece) {
    return fail("no_piece", `Invalid input: There is no piece at ${formatSquare(coord)}.`);
  }
  if (piece.color !== state.turn) {
    return fail(
      "wrong_color",
      `Invalid input: You cannot select a ${piece.color} piece on ${capitalize(state.turn)}'s turn.`
    );
  }

  const moves = getLegalMoves(state.board, coord, piece);
  state.selected = { ...coord };
  state.selectedMoves = moves;
  return succeed(moves);
};

/**
 * The cached selection applies only when it names the same square; any other
 * origin gets a fresh move list.
 */
const resolveLegalMoves = (state: GameState, from: Coord): ValidationResult<MoveDetail[]> => {
  if (equalCoord(state.selected, from) && state.selectedMoves) {
    return succeed(state.selectedMoves);
  }

  const piece = getPiece(state.board, from);
  if (!piece) {
    return fail("no_piece", `Invalid move: There is no piece at ${formatSquare(from)}.`);
  }
  if (piece.color !== state.turn) {
    return fail("wrong_color", "Invalid move: You can't move your opponent's piece.");
  }
  return succeed(getLegalMoves(state.board, from, piece));
};

export const attemptMove = (state: GameState, from: Coord, to: Coord): ValidationResult<MoveOutcome> => {
  if (isGameOver(state)) {
    return fail("game_over", "The game is over. Type 'restart' or 'exit'.");
  }

  const legalMoves = resolveLegalMoves(state, from);
  if (!legalMoves.ok) {
    return legalMoves;
  }

  const piece = getPiece(state.board, from);
  if (!piece) {
    return fail("no_piece", `Invalid move: There is no piece at ${formatSquare(from)}.`);
  }

  const result = movePiece(state.board, from, to, state.turn, legalMoves.value);
  if (!result.ok) {
    return result;
  }

  const captured = result.value;
  if (captured?.type === "royal") {
    state.phase = "completed";
    state.winner = state.turn;
  } else {
    switchTurn(state);
  }

  return succeed({
    piece,
    from: { ...from },
    to: { ...to },
    captured,
    gameOver: isGameOver(state)
  });
};
