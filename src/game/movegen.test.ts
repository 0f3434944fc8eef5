import { describe, it, expect } from "vitest";
import type { Cell } from "../types.ts";
import { Board } from "./board.ts";
import {
  canCaptureFrom,
  generateCaptureMoves,
  generateLegalMoves,
  generateQuietMoves,
  hasAnyCapture,
} from "./movegen.ts";
import type { Move } from "./move.ts";

function mkBoard(pieces: Array<[number, number, Cell]>, size = 8): Board {
  const board = Board.empty(size);
  for (const [r, c, cell] of pieces) board.setCell(r, c, cell);
  return board;
}

function plain(moves: Move[]): Array<{ start: { r: number; c: number }; steps: Array<{ r: number; c: number }> }> {
  return moves.map((m) => ({ start: m.start, steps: m.steps }));
}

describe("generateLegalMoves", () => {
  it("gives Black 7 quiet moves from the 8x8 start", () => {
    const moves = generateLegalMoves(new Board(), "B");
    expect(moves).toHaveLength(7);
    expect(moves.every((m) => m.steps.length === 1 && !m.isCapture())).toBe(true);
    expect(moves.every((m) => m.start.r === 2)).toBe(true);
  });

  it("gives White 7 quiet moves from the 8x8 start", () => {
    const moves = generateLegalMoves(new Board(), "W");
    expect(moves).toHaveLength(7);
    expect(moves.every((m) => m.start.r === 5 && m.steps[0].r === 4)).toBe(true);
  });

  it("lists 4x4 opening moves in board order", () => {
    expect(plain(generateLegalMoves(new Board(4), "B"))).toEqual([
      { start: { r: 0, c: 1 }, steps: [{ r: 1, c: 0 }] },
      { start: { r: 0, c: 1 }, steps: [{ r: 1, c: 2 }] },
      { start: { r: 0, c: 3 }, steps: [{ r: 1, c: 2 }] },
    ]);
  });

  it("men step forward only", () => {
    const board = mkBoard([
      [4, 3, "blackMan"],
      [1, 2, "whiteMan"],
    ]);
    expect(plain(generateLegalMoves(board, "B"))).toEqual([
      { start: { r: 4, c: 3 }, steps: [{ r: 5, c: 2 }] },
      { start: { r: 4, c: 3 }, steps: [{ r: 5, c: 4 }] },
    ]);
    expect(plain(generateLegalMoves(board, "W"))).toEqual([
      { start: { r: 1, c: 2 }, steps: [{ r: 0, c: 1 }] },
      { start: { r: 1, c: 2 }, steps: [{ r: 0, c: 3 }] },
    ]);
  });

  it("kings step in all four diagonals", () => {
    const board = mkBoard([[3, 2, "blackKing"]]);
    expect(plain(generateLegalMoves(board, "B")).map((m) => m.steps[0])).toEqual([
      { r: 2, c: 1 },
      { r: 2, c: 3 },
      { r: 4, c: 1 },
      { r: 4, c: 3 },
    ]);
  });

  it("a lone capture is the only legal move", () => {
    const board = mkBoard([
      [2, 3, "blackMan"],
      [3, 4, "whiteMan"],
    ]);
    expect(plain(generateLegalMoves(board, "B"))).toEqual([
      { start: { r: 2, c: 3 }, steps: [{ r: 4, c: 5 }] },
    ]);
  });

  it("forces captures board-wide", () => {
    const board = mkBoard([
      [0, 1, "blackMan"],
      [2, 3, "blackMan"],
      [2, 7, "blackKing"],
      [3, 4, "whiteMan"],
    ]);
    expect(generateQuietMoves(board, "B").length).toBeGreaterThan(0);
    const moves = generateLegalMoves(board, "B");
    expect(moves).toHaveLength(1);
    expect(moves.every((m) => m.isCapture())).toBe(true);
    expect(hasAnyCapture(board, "B")).toBe(true);
  });

  it("men do not capture backwards", () => {
    const board = mkBoard([
      [4, 3, "blackMan"],
      [3, 2, "whiteMan"],
      [3, 4, "whiteMan"],
    ]);
    expect(generateCaptureMoves(board, "B")).toEqual([]);
    expect(plain(generateLegalMoves(board, "B"))).toEqual([
      { start: { r: 4, c: 3 }, steps: [{ r: 5, c: 2 }] },
      { start: { r: 4, c: 3 }, steps: [{ r: 5, c: 4 }] },
    ]);
  });

  it("kings capture backwards", () => {
    const board = mkBoard([
      [4, 3, "blackKing"],
      [3, 2, "whiteMan"],
    ]);
    expect(plain(generateLegalMoves(board, "B"))).toEqual([
      { start: { r: 4, c: 3 }, steps: [{ r: 2, c: 1 }] },
    ]);
  });

  it("cannot jump own pieces or land on occupied squares", () => {
    const board = mkBoard([
      [2, 3, "blackMan"],
      [3, 4, "blackMan"],
      [3, 2, "whiteMan"],
      [4, 1, "whiteMan"],
    ]);
    expect(generateCaptureMoves(board, "B")).toEqual([]);
  });

  it("continues a multi-jump chain to the end", () => {
    const board = mkBoard([
      [0, 1, "blackMan"],
      [1, 2, "whiteMan"],
      [3, 4, "whiteMan"],
    ]);
    expect(plain(generateLegalMoves(board, "B"))).toEqual([
      {
        start: { r: 0, c: 1 },
        steps: [
          { r: 2, c: 3 },
          { r: 4, c: 5 },
        ],
      },
    ]);
  });

  it("returns each divergent maximal chain as its own move", () => {
    const board = mkBoard([
      [0, 3, "blackMan"],
      [1, 4, "whiteMan"],
      [3, 4, "whiteMan"],
      [3, 6, "whiteMan"],
    ]);
    expect(plain(generateLegalMoves(board, "B"))).toEqual([
      {
        start: { r: 0, c: 3 },
        steps: [
          { r: 2, c: 5 },
          { r: 4, c: 3 },
        ],
      },
      {
        start: { r: 0, c: 3 },
        steps: [
          { r: 2, c: 5 },
          { r: 4, c: 7 },
        ],
      },
    ]);
  });

  it("ends the chain when a man is crowned mid-capture", () => {
    // A king on r7c4 could go on over r6c5; the newly crowned man stops.
    const board = mkBoard([
      [5, 2, "blackMan"],
      [6, 3, "whiteMan"],
      [6, 5, "whiteMan"],
    ]);
    expect(plain(generateLegalMoves(board, "B"))).toEqual([
      { start: { r: 5, c: 2 }, steps: [{ r: 7, c: 4 }] },
    ]);
  });

  it("lets a king chain come back through its own start square", () => {
    const board = mkBoard([
      [2, 3, "blackKing"],
      [3, 4, "whiteMan"],
      [5, 4, "whiteMan"],
      [5, 2, "whiteMan"],
      [3, 2, "whiteMan"],
    ]);
    const moves = generateLegalMoves(board, "B");
    expect(moves).toHaveLength(2);
    expect(moves.every((m) => m.steps.length === 4)).toBe(true);
    expect(moves.map((m) => m.landing())).toEqual([
      { r: 2, c: 3 },
      { r: 2, c: 3 },
    ]);
    expect(plain(moves)[0].steps).toEqual([
      { r: 4, c: 1 },
      { r: 6, c: 3 },
      { r: 4, c: 5 },
      { r: 2, c: 3 },
    ]);
  });

  it("never jumps the same piece twice", () => {
    const board = mkBoard([
      [2, 1, "blackKing"],
      [3, 2, "whiteMan"],
    ]);
    expect(plain(generateLegalMoves(board, "B"))).toEqual([
      { start: { r: 2, c: 1 }, steps: [{ r: 4, c: 3 }] },
    ]);
  });

  it("returns nothing for a side without pieces", () => {
    expect(generateLegalMoves(mkBoard([[2, 3, "blackMan"]]), "W")).toEqual([]);
  });
});

describe("canCaptureFrom", () => {
  it("checks a single square", () => {
    const board = mkBoard([
      [2, 3, "blackMan"],
      [3, 4, "whiteMan"],
    ]);
    expect(canCaptureFrom(board, { r: 2, c: 3 })).toBe(true);
    expect(canCaptureFrom(board, { r: 3, c: 4 })).toBe(true);
    expect(canCaptureFrom(board, { r: 0, c: 1 })).toBe(false);
  });
});
