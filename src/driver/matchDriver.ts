import type { GameStatus } from "../types.ts";
import { playerName } from "../types.ts";
import { pickerFor, type MatchPlayers } from "../ai/aiTypes.ts";
import { formatMove } from "../game/coordFormat.ts";
import type { AppliedMove, Game } from "../game/game.ts";
import type { Move } from "../game/move.ts";
import { silentLogger, type Logger } from "../shared/logger.ts";

export const DEFAULT_MAX_TURNS = 1000;

export interface TurnReport {
  turn: number;
  move: Move;
  applied: AppliedMove;
  game: Game;
}

export interface MatchOptions {
  game: Game;
  players: MatchPlayers;
  maxTurns?: number;
  logger?: Logger;
  onTurn?: (report: TurnReport) => void;
}

export interface MatchResult {
  status: GameStatus;
  reason: string | null;
  turns: number;
  moves: Move[];
}

/**
 * Alternate the two players on `game` until it ends or `maxTurns` is
 * reached. Each player is handed the opponent's previous move so a player
 * keeping its own mirror of the game can stay in sync.
 */
export function playMatch(options: MatchOptions): MatchResult {
  const { game, players, onTurn } = options;
  const maxTurns = options.maxTurns ?? DEFAULT_MAX_TURNS;
  const logger = options.logger ?? silentLogger;

  const moves: Move[] = [];
  let lastMove: Move | undefined;

  while (game.state === "unfinished" && moves.length < maxTurns) {
    const picker = pickerFor(players, game.turn);
    const move = picker.makeMove(lastMove);
    const applied = game.makeMove(move);
    moves.push(move);
    lastMove = move;

    logger.debug(
      `turn ${moves.length}: ${playerName(applied.mover)} ${formatMove(move, game.board.size)}` +
        (applied.promoted ? " (crowned)" : "")
    );
    onTurn?.({ turn: moves.length, move, applied, game });
  }

  if (game.state === "unfinished") {
    logger.warn(`match stopped after ${maxTurns} turns without a result`);
  } else {
    logger.info(`match over after ${moves.length} turns: ${game.describeResult() ?? game.state}`);
  }

  return { status: game.state, reason: game.describeResult(), turns: moves.length, moves };
}
