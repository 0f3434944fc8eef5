import type { Player } from "../types.ts";
import type { Move } from "../game/move.ts";

/**
 * Anything that can take part in a match: it is told the opponent's last
 * move (absent on the very first turn of the game) and answers with its own.
 */
export interface MovePicker {
  readonly color: Player;
  makeMove(opponentMove?: Move): Move;
}

export interface MatchPlayers {
  black: MovePicker;
  white: MovePicker;
}

export function pickerFor(players: MatchPlayers, p: Player): MovePicker {
  return p === "W" ? players.white : players.black;
}
