import { describe, it, expect } from "vitest";
import type { Cell } from "../types.ts";
import { Board } from "./board.ts";
import { getGameStatus } from "./gameOver.ts";

function mkBoard(pieces: Array<[number, number, Cell]>): Board {
  const board = Board.empty(8);
  for (const [r, c, cell] of pieces) board.setCell(r, c, cell);
  return board;
}

describe("getGameStatus", () => {
  it("is unfinished at the start", () => {
    expect(getGameStatus(new Board(), "B", 0, 32)).toEqual({ status: "unfinished", reason: null });
  });

  it("awards the win when the side to move has no pieces", () => {
    const board = mkBoard([[4, 5, "blackMan"]]);
    expect(getGameStatus(board, "W", 0, 32)).toEqual({
      status: "blackWon",
      reason: "Black wins - White has no pieces",
    });
  });

  it("awards the win when the side to move is blocked", () => {
    // Black man on r7c0 is on its last row and cannot move forward.
    const board = mkBoard([
      [7, 0, "blackMan"],
      [2, 3, "whiteMan"],
    ]);
    expect(getGameStatus(board, "B", 0, 32)).toEqual({
      status: "whiteWon",
      reason: "White wins - Black has no moves",
    });
  });

  it("ties once the counter reaches the limit", () => {
    const board = mkBoard([
      [0, 1, "blackKing"],
      [7, 6, "whiteKing"],
    ]);
    expect(getGameStatus(board, "B", 9, 10).status).toBe("unfinished");
    expect(getGameStatus(board, "B", 10, 10)).toEqual({
      status: "tie",
      reason: "Tie - 10 turns without a capture",
    });
  });

  it("checks for a win before the tie limit", () => {
    const board = mkBoard([[0, 1, "blackKing"]]);
    expect(getGameStatus(board, "W", 50, 10).status).toBe("blackWon");
  });
});
