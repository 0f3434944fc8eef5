import type { GameStatus, Player } from "../types.ts";
import { otherPlayer, playerName } from "../types.ts";
import type { Board } from "./board.ts";
import { generateLegalMoves } from "./movegen.ts";

export interface GameOverCheck {
  status: GameStatus;
  reason: string | null;
}

function wonBy(player: Player): GameStatus {
  return player === "B" ? "blackWon" : "whiteWon";
}

/**
 * Status at a turn boundary, with `toMove` the side about to move.
 * The side that just moved wins if `toMove` has no pieces or no legal
 * moves; otherwise the game is tied once `tieCounter` reaches `tieMax`.
 */
export function getGameStatus(board: Board, toMove: Player, tieCounter: number, tieMax: number): GameOverCheck {
  const mover = otherPlayer(toMove);

  if (board.countPieces(toMove) === 0) {
    return {
      status: wonBy(mover),
      reason: `${playerName(mover)} wins - ${playerName(toMove)} has no pieces`,
    };
  }

  if (generateLegalMoves(board, toMove).length === 0) {
    return {
      status: wonBy(mover),
      reason: `${playerName(mover)} wins - ${playerName(toMove)} has no moves`,
    };
  }

  if (tieCounter >= tieMax) {
    return { status: "tie", reason: `Tie - ${tieCounter} turns without a capture` };
  }

  return { status: "unfinished", reason: null };
}
