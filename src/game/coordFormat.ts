import { isPlayable, squareId, type Square } from "./coords.ts";
import { Move } from "./move.ts";

export type CoordFormat = "rc" | "number";

// Dark squares are numbered 1..N²/2 row by row from the top, left to right.
export function squareToNumber(sq: Square, boardSize: number): number | null {
  if (!isPlayable(sq.r, sq.c, boardSize)) return null;
  return sq.r * (boardSize / 2) + Math.floor(sq.c / 2) + 1;
}

export function numberToSquare(n: number, boardSize: number): Square | null {
  const perRow = boardSize / 2;
  if (!Number.isInteger(n) || n < 1 || n > perRow * boardSize) return null;
  const idx = n - 1;
  const r = Math.floor(idx / perRow);
  const c = 2 * (idx % perRow) + (r % 2 === 0 ? 1 : 0);
  return { r, c };
}

export function formatSquare(sq: Square, format: CoordFormat, boardSize: number): string {
  if (format === "number") {
    const n = squareToNumber(sq, boardSize);
    return n === null ? squareId(sq) : String(n);
  }
  return squareId(sq);
}

/** `11-15` for a quiet move, `9x18x27` for a capture chain. */
export function formatMove(move: Move, boardSize: number, format: CoordFormat = "number"): string {
  const sep = move.isCapture() ? "x" : "-";
  return [move.start, ...move.steps].map((sq) => formatSquare(sq, format, boardSize)).join(sep);
}

const MOVE_RE = /^\d+(?:[-x]\d+)+$/;

/** Parse numbered-square notation. Returns null for anything malformed. */
export function parseMove(text: string, boardSize: number): Move | null {
  const trimmed = text.trim();
  if (!MOVE_RE.test(trimmed)) return null;

  const squares: Square[] = [];
  for (const part of trimmed.split(/[-x]/)) {
    const sq = numberToSquare(Number(part), boardSize);
    if (!sq) return null;
    squares.push(sq);
  }

  const [start, ...steps] = squares;
  if (!start) return null;
  return new Move(start, steps);
}
