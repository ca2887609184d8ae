import {
  attemptMove,
  capitalize,
  createGame,
  formatSquare,
  isGameOver,
  lastSquareLabel,
  parseSquare,
  restartGame,
  selectPiece
} from "@skirmish/shared";
import type { GameState } from "@skirmish/shared";
import { HELP_LINES, parseCommand } from "./commands";
import type { Command } from "./commands";
import { pieceSymbol, renderBoard, renderStatus } from "./render";

export interface OutputSink {
  write(line: string): void;
}

export interface SessionOptions {
  width: number;
  height: number;
  output: OutputSink;
}

const GAME_OVER_HINT = 'Game is over. Type "restart" to play again or "exit" to leave.';

export class GameSession {
  private state: GameState;
  private exited = false;

  constructor(private readonly options: SessionOptions) {
    this.state = createGame(options.width, options.height);
  }

  get game(): Readonly<GameState> {
    return this.state;
  }

  get finished(): boolean {
    return this.exited;
  }

  get prompt(): string {
    return isGameOver(this.state) ? "> " : 'Type a command (type "help" for options):\n> ';
  }

  renderView(): void {
    this.write("");
    renderBoard(this.state).forEach((line) => this.write(line));
    this.write("");
    renderStatus(this.state).forEach((line) => this.write(line));
  }

  handleLine(line: string): void {
    if (this.exited) return;

    const parsed = parseCommand(line);
    if (parsed.ok && !parsed.command) return;

    const command = parsed.ok ? parsed.command : null;
    if (isGameOver(this.state) && command?.type !== "restart" && command?.type !== "exit") {
      this.write(GAME_OVER_HINT);
      return;
    }

    if (!parsed.ok) {
      parsed.messages.forEach((message) => this.write(message));
      return;
    }
    if (command) {
      this.handleCommand(command);
    }
  }

  private handleCommand(command: Command): void {
    switch (command.type) {
      case "help":
        HELP_LINES.forEach((line) => this.write(line));
        break;
      case "exit":
        this.write("Exiting Skirmish. Goodbye!");
        this.exited = true;
        break;
      case "restart":
        this.write("Restarting match...");
        restartGame(this.state, this.options.width, this.options.height);
        break;
      case "select":
        this.handleSelect(command.args[0]);
        break;
      case "move":
        this.handleMove(command.args[0], command.args[1]);
        break;
    }
  }

  private handleSelect(label: string): void {
    const { height, width } = this.state.board;
    const square = parseSquare(label, height, width);
    if (!square.ok) {
      this.write(`Invalid input: ${label.toUpperCase()} is not a valid square on the board.`);
      this.write(`Please enter coordinates from A1 to ${lastSquareLabel(height, width)}.`);
      return;
    }

    const result = selectPiece(this.state, square.value);
    if (!result.ok) {
      this.write(result.error);
      return;
    }

    const piece = this.state.board.grid[square.value.row][square.value.col];
    const prefix = `Selected: ${piece ? pieceSymbol(piece) : "?"} at ${formatSquare(square.value)}.`;
    if (result.value.length === 0) {
      this.write(`${prefix} No available moves.`);
      return;
    }
    const destinations = result.value.map((move) => formatSquare(move.to)).join(", ");
    this.write(`${prefix} Available moves: ${destinations}`);
  }

  private handleMove(fromLabel: string, toLabel: string): void {
    const { height, width } = this.state.board;
    const from = parseSquare(fromLabel, height, width);
    if (!from.ok) {
      this.write(`Invalid input: ${fromLabel.toUpperCase()} is not a valid 'from' square.`);
      return;
    }
    const to = parseSquare(toLabel, height, width);
    if (!to.ok) {
      this.write(`Invalid input: ${toLabel.toUpperCase()} is not a valid 'to' square.`);
      return;
    }

    const result = attemptMove(this.state, from.value, to.value);
    if (!result.ok) {
      this.write(result.error);
      return;
    }

    const { piece, captured, gameOver } = result.value;
    const moved = `Moved ${pieceSymbol(piece)} from ${formatSquare(from.value)} to ${formatSquare(to.value)}.`;
    this.write(captured ? `${moved} Captured ${pieceSymbol(captured)}.` : moved);
    if (gameOver && this.state.winner) {
      this.write(`${capitalize(this.state.winner)} captured the opposing Royal.`);
    }
  }

  private write(line: string): void {
    this.options.output.write(line);
  }
}
