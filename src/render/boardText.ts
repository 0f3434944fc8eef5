import type { Cell } from "../types.ts";
import { Board } from "../game/board.ts";
import { isDark } from "../game/coords.ts";
import { InvalidOptionsError } from "../game/errors.ts";

const CELL_GLYPHS: Record<Cell, string> = {
  darkEmpty: "  ",
  lightEmpty: "__",
  blackMan: "b ",
  whiteMan: "w ",
  blackKing: "B ",
  whiteKing: "W ",
};

const PIECE_BY_GLYPH: Record<string, Cell | undefined> = {
  "b ": "blackMan",
  "w ": "whiteMan",
  "B ": "blackKing",
  "W ": "whiteKing",
};

export function cellGlyph(cell: Cell): string {
  return CELL_GLYPHS[cell];
}

function frameLine(size: number): string {
  return `|${"--".repeat(size)}|`;
}

/**
 * Two characters per cell, framed:
 *
 *   |--------|
 *   |__b __b |
 *   |  __  __|
 *   |__  __  |
 *   |w __w __|
 *   |--------|
 */
export function renderBoard(cells: readonly (readonly Cell[])[]): string {
  const size = cells.length;
  const lines = [frameLine(size)];
  for (const row of cells) {
    lines.push(`|${row.map(cellGlyph).join("")}|`);
  }
  lines.push(frameLine(size));
  return lines.join("\n");
}

function isFrame(line: string): boolean {
  return /^\|?-+\|?$/.test(line);
}

function stripBars(line: string): string {
  let out = line;
  if (out.startsWith("|")) out = out.slice(1);
  if (out.endsWith("|")) out = out.slice(0, -1);
  return out;
}

/**
 * Inverse of renderBoard. Frame lines and blank lines are ignored; rows may
 * omit the `|` borders. Either empty glyph is accepted on any square, but a
 * piece on a light square is rejected.
 */
export function parseBoard(text: string): Board {
  const rows = text
    .split("\n")
    .map((line) => line.replace(/\r$/, ""))
    .filter((line) => line.trim().length > 0 && !isFrame(line.trim()))
    .map(stripBars);

  const size = rows.length;
  const board = Board.empty(size);

  rows.forEach((row, r) => {
    if (row.length !== size * 2) {
      throw new InvalidOptionsError(`board row ${r} has ${row.length} characters, expected ${size * 2}`, { row: r });
    }
    for (let c = 0; c < size; c++) {
      const glyph = row.slice(c * 2, c * 2 + 2);
      if (glyph === "  " || glyph === "__") continue;
      const cell = PIECE_BY_GLYPH[glyph];
      if (!cell) {
        throw new InvalidOptionsError(`unknown glyph "${glyph}" at r${r}c${c}`, { row: r, col: c });
      }
      if (!isDark(r, c)) {
        throw new InvalidOptionsError(`piece on light square r${r}c${c}`, { row: r, col: c });
      }
      board.setCell(r, c, cell);
    }
  });

  return board;
}
