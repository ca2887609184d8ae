import { describe, expect, it } from "vitest";
import {
  attemptMove,
  countPieces,
  createGame,
  formatSquare,
  getPiece,
  restartGame,
  selectPiece,
  switchTurn
} from "@skirmish/shared";
import type { Coord, GameState, Piece, PlayerColor, Square } from "@skirmish/shared";

const WHITE_RUNNER: Piece = { type: "runner", color: "white" };
const WHITE_LEAPER: Piece = { type: "leaper", color: "white" };
const WHITE_ROYAL: Piece = { type: "royal", color: "white" };
const BLACK_LEAPER: Piece = { type: "leaper", color: "black" };
const BLACK_ROYAL: Piece = { type: "royal", color: "black" };

const buildActiveState = (turn: PlayerColor, pieces: Array<[Coord, Piece]>): GameState => {
  const state = createGame(8, 8);
  state.turn = turn;
  state.board.grid = Array.from({ length: 8 }, () => Array.from({ length: 8 }, (): Square => null));
  for (const [coord, piece] of pieces) {
    state.board.grid[coord.row][coord.col] = piece;
  }
  return state;
};

describe("game setup", () => {
  it("starts in progress with white to move and nothing selected", () => {
    const state = createGame(8, 6);
    expect(state.phase).toBe("in-progress");
    expect(state.turn).toBe("white");
    expect(state.selected).toBeNull();
    expect(state.selectedMoves).toBeNull();
    expect(state.winner).toBeUndefined();
    expect(countPieces(state.board, "white")).toBe(3);
    expect(countPieces(state.board, "black")).toBe(3);
  });
});

describe("selection", () => {
  it("caches the legal moves of the selected piece", () => {
    const state = createGame(8, 6);
    const result = selectPiece(state, { row: 0, col: 1 });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.map((move) => formatSquare(move.to))).toStrictEqual([
      "A2",
      "B2",
      "B3",
      "B4",
      "C2",
      "D3",
      "E4"
    ]);
    expect(state.selected).toStrictEqual({ row: 0, col: 1 });
    expect(state.selectedMoves).toStrictEqual(result.value);
  });

  it("rejects empty squares and opposing pieces without changing the selection", () => {
    const state = createGame(8, 6);
    expect(selectPiece(state, { row: 0, col: 2 }).ok).toBe(true);

    expect(selectPiece(state, { row: 3, col: 3 })).toStrictEqual({
      ok: false,
      code: "no_piece",
      error: "Invalid input: There is no piece at D4."
    });
    expect(selectPiece(state, { row: 5, col: 7 })).toStrictEqual({
      ok: false,
      code: "wrong_color",
      error: "Invalid input: You cannot select a black piece on White's turn."
    });
    expect(state.selected).toStrictEqual({ row: 0, col: 2 });
  });
});

describe("movement", () => {
  it("moves the selected piece and hands the turn over", () => {
    const state = createGame(8, 6);
    selectPiece(state, { row: 0, col: 1 });

    const result = attemptMove(state, { row: 0, col: 1 }, { row: 3, col: 1 });
    expect(result).toStrictEqual({
      ok: true,
      value: {
        piece: WHITE_RUNNER,
        from: { row: 0, col: 1 },
        to: { row: 3, col: 1 },
        captured: null,
        gameOver: false
      }
    });
    expect(getPiece(state.board, { row: 3, col: 1 })).toStrictEqual(WHITE_RUNNER);
    expect(state.turn).toBe("black");
    expect(state.selected).toBeNull();
    expect(state.selectedMoves).toBeNull();
  });

  it("accepts a direct move without a prior selection", () => {
    const state = createGame(8, 6);
    const result = attemptMove(state, { row: 0, col: 2 }, { row: 1, col: 4 });
    expect(result.ok).toBe(true);
    expect(getPiece(state.board, { row: 1, col: 4 })).toStrictEqual(WHITE_LEAPER);
    expect(state.turn).toBe("black");
  });

  it("recomputes moves when the origin differs from the selection", () => {
    const state = createGame(8, 6);
    selectPiece(state, { row: 0, col: 1 });

    // B4 is a runner destination, not a leaper one.
    const result = attemptMove(state, { row: 0, col: 2 }, { row: 3, col: 1 });
    expect(result).toStrictEqual({
      ok: false,
      code: "illegal_destination",
      error: "Invalid move: White Leaper can't move to B4."
    });
    expect(getPiece(state.board, { row: 0, col: 2 })).toStrictEqual(WHITE_LEAPER);
    expect(state.turn).toBe("white");
  });

  it("rejects moving from an empty square or an opposing piece", () => {
    const state = createGame(8, 6);
    expect(attemptMove(state, { row: 2, col: 2 }, { row: 3, col: 3 })).toStrictEqual({
      ok: false,
      code: "no_piece",
      error: "Invalid move: There is no piece at C3."
    });
    expect(attemptMove(state, { row: 5, col: 7 }, { row: 4, col: 7 })).toStrictEqual({
      ok: false,
      code: "wrong_color",
      error: "Invalid move: You can't move your opponent's piece."
    });
    expect(state.turn).toBe("white");
  });

  it("rejects an unreachable destination and leaves the runner in place", () => {
    const state = createGame(8, 6);
    selectPiece(state, { row: 0, col: 1 });
    const before = structuredClone(state.board.grid);

    const result = attemptMove(state, { row: 0, col: 1 }, { row: 0, col: 3 });
    expect(result.ok ? undefined : result.code).toBe("illegal_destination");
    expect(state.board.grid).toStrictEqual(before);
    expect(getPiece(state.board, { row: 0, col: 1 })).toStrictEqual(WHITE_RUNNER);
    expect(state.turn).toBe("white");
    expect(state.selected).toStrictEqual({ row: 0, col: 1 });
  });

  it("rejects moving onto the origin square", () => {
    const state = createGame(8, 6);
    const result = attemptMove(state, { row: 0, col: 0 }, { row: 0, col: 0 });
    expect(result.ok ? undefined : result.code).toBe("same_square");
  });

  it("captures by jumping and keeps both royals on the board", () => {
    const state = buildActiveState("white", [
      [{ row: 0, col: 0 }, WHITE_ROYAL],
      [{ row: 7, col: 7 }, BLACK_ROYAL],
      [{ row: 2, col: 2 }, WHITE_RUNNER],
      [{ row: 3, col: 3 }, BLACK_LEAPER]
    ]);

    const result = attemptMove(state, { row: 2, col: 2 }, { row: 4, col: 4 });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.captured).toStrictEqual(BLACK_LEAPER);
    expect(result.value.gameOver).toBe(false);
    expect(getPiece(state.board, { row: 3, col: 3 })).toBeNull();
    expect(getPiece(state.board, { row: 4, col: 4 })).toStrictEqual(WHITE_RUNNER);
    expect(countPieces(state.board, "white", "royal")).toBe(1);
    expect(countPieces(state.board, "black", "royal")).toBe(1);
    expect(state.turn).toBe("black");
  });

  it("only lets the side to move act after the turn switches", () => {
    const state = createGame(8, 6);
    expect(attemptMove(state, { row: 0, col: 1 }, { row: 3, col: 1 }).ok).toBe(true);

    const again = attemptMove(state, { row: 3, col: 1 }, { row: 4, col: 1 });
    expect(again.ok ? undefined : again.code).toBe("wrong_color");

    const reply = attemptMove(state, { row: 5, col: 6 }, { row: 4, col: 6 });
    expect(reply.ok).toBe(true);
    expect(state.turn).toBe("white");
  });
});

describe("game completion", () => {
  const captureRoyal = (): GameState => {
    const state = buildActiveState("white", [
      [{ row: 7, col: 7 }, WHITE_ROYAL],
      [{ row: 0, col: 0 }, WHITE_LEAPER],
      [{ row: 2, col: 1 }, BLACK_ROYAL]
    ]);
    const result = attemptMove(state, { row: 0, col: 0 }, { row: 2, col: 1 });
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.captured).toStrictEqual(BLACK_ROYAL);
      expect(result.value.gameOver).toBe(true);
    }
    return state;
  };

  it("ends the game with the capturing side as winner", () => {
    const state = captureRoyal();
    expect(state.phase).toBe("completed");
    expect(state.winner).toBe("white");
    expect(state.turn).toBe("white");
  });

  it("keeps the selection that made the winning capture", () => {
    const state = buildActiveState("white", [
      [{ row: 7, col: 7 }, WHITE_ROYAL],
      [{ row: 0, col: 0 }, WHITE_LEAPER],
      [{ row: 2, col: 1 }, BLACK_ROYAL]
    ]);
    const selection = selectPiece(state, { row: 0, col: 0 });
    expect(selection.ok).toBe(true);
    expect(attemptMove(state, { row: 0, col: 0 }, { row: 2, col: 1 }).ok).toBe(true);
    expect(state.phase).toBe("completed");
    expect(countPieces(state.board, "black", "royal")).toBe(0);
    expect(countPieces(state.board, "white", "royal")).toBe(1);
    expect(state.selected).toStrictEqual({ row: 0, col: 0 });
    expect(state.selectedMoves).toStrictEqual(selection.ok ? selection.value : null);
  });

  it("refuses selections and moves once the game is over", () => {
    const state = captureRoyal();
    expect(attemptMove(state, { row: 7, col: 7 }, { row: 6, col: 7 })).toStrictEqual({
      ok: false,
      code: "game_over",
      error: "The game is over. Type 'restart' or 'exit'."
    });
    expect(selectPiece(state, { row: 7, col: 7 })).toStrictEqual({
      ok: false,
      code: "game_over",
      error: "The game is over."
    });
    expect(getPiece(state.board, { row: 7, col: 7 })).toStrictEqual(WHITE_ROYAL);
  });

  it("restarts with a fresh board and white to move", () => {
    const state = captureRoyal();
    restartGame(state, 6, 7);
    expect(state.phase).toBe("in-progress");
    expect(state.turn).toBe("white");
    expect(state.winner).toBeUndefined();
    expect(state.board.width).toBe(6);
    expect(state.board.height).toBe(7);
    expect(getPiece(state.board, { row: 6, col: 5 })).toStrictEqual(BLACK_ROYAL);
    expect(selectPiece(state, { row: 0, col: 0 }).ok).toBe(true);
  });
});

describe("turn switching", () => {
  it("flips the side to move and drops the selection", () => {
    const state = createGame(6, 6);
    selectPiece(state, { row: 0, col: 0 });
    switchTurn(state);
    expect(state.turn).toBe("black");
    expect(state.selected).toBeNull();
    expect(state.selectedMoves).toBeNull();
  });
});
