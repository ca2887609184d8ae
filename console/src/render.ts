import { capitalize, columnLetter, coordKey, equalCoord, isGameOver } from "@skirmish/shared";
import type { CoordKey, GameState, Piece, PieceType, PlayerColor } from "@skirmish/shared";

const PIECE_SYMBOLS: Record<PlayerColor, Record<PieceType, string>> = {
  white: { royal: "♔", runner: "♖", leaper: "♘" },
  black: { royal: "♚", runner: "♜", leaper: "♞" }
};

const MOVE_MARK = ".";
const CAPTURE_MARK = "•";

export const pieceSymbol = (piece: Piece): string => PIECE_SYMBOLS[piece.color][piece.type];

/** Draws the board top row first, marking the selection and its destinations. */
export const renderBoard = (state: GameState): string[] => {
  const { board, selected, selectedMoves } = state;
  const marks = new Map<CoordKey, string>();
  for (const move of selectedMoves ?? []) {
    marks.set(coordKey(move.to), move.capture ? CAPTURE_MARK : MOVE_MARK);
  }

  const columns = Array.from({ length: board.width }, (_, col) => ` ${columnLetter(col)} `).join("");
  const border = `  +${"---".repeat(board.width)}+`;
  const lines = [`   ${columns}`, border];

  for (let row = board.height - 1; row >= 0; row -= 1) {
    let cells = "";
    for (let col = 0; col < board.width; col += 1) {
      const piece = board.grid[row][col];
      const content = piece ? pieceSymbol(piece) : marks.get(coordKey({ row, col })) ?? " ";
      cells += equalCoord(selected, { row, col }) ? `[${content}]` : ` ${content} `;
    }
    lines.push(`${String(row + 1).padStart(2)}|${cells}|`);
  }

  lines.push(border);
  return lines;
};

export const renderStatus = (state: GameState): string[] => {
  if (isGameOver(state) && state.winner) {
    return [`${capitalize(state.winner)} wins!`, 'Type "restart" to play again or "exit" to leave.'];
  }
  return [`Turn: ${capitalize(state.turn)}`];
};
