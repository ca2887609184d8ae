import { fail, succeed } from "../types";
import type { ValidationResult } from "../types";
import type { Coord } from "./board";

const COLUMN_BASE = "A".charCodeAt(0);

export const columnLetter = (col: number): string => String.fromCharCode(COLUMN_BASE + col);

export const formatSquare = (coord: Coord): string => `${columnLetter(coord.col)}${coord.row + 1}`;

export const lastSquareLabel = (height: number, width: number): string =>
  formatSquare({ row: height - 1, col: width - 1 });

/**
 * Parses a square label such as `C3` (column letter, 1-based row) into a
 * zero-based coordinate on a board of the given size.
 */
export const parseSquare = (label: string, height: number, width: number): ValidationResult<Coord> => {
  const trimmed = label.trim();
  if (trimmed.length < 2) {
    return fail("invalid_format", `Invalid coordinate format: ${label}`);
  }

  const rowText = trimmed.slice(1);
  if (!/^\+?\d+$/.test(rowText)) {
    return fail("invalid_format", `Invalid row number in coordinate: ${label}`);
  }

  const rowNumber = Number.parseInt(rowText, 10);
  if (rowNumber === 0 || rowNumber > height) {
    return fail("out_of_range", `Row number ${rowNumber} out of bounds (1-${height}).`);
  }

  const letter = trimmed.charAt(0).toUpperCase();
  const col = letter.charCodeAt(0) - COLUMN_BASE;
  if (col < 0 || col >= width) {
    return fail("out_of_range", `Column ${letter} out of bounds (A-${columnLetter(width - 1)}).`);
  }

  return succeed({ row: rowNumber - 1, col });
};
