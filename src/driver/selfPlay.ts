import { RandomPlayer } from "../ai/randomPlayer.ts";
import { Game } from "../game/game.ts";
import type { GameOptions } from "../game/options.ts";
import { renderBoard } from "../render/boardText.ts";
import type { Env } from "../shared/env.ts";
import { createLogger, type LogSink } from "../shared/logger.ts";
import { createPrng, randomSeed } from "../shared/prng.ts";
import { playMatch, type MatchResult } from "./matchDriver.ts";

export interface SelfPlayResult extends MatchResult {
  seed: string;
  finalBoard: string;
}

/** One random-vs-random match configured from the environment. */
export function runSelfPlay(env: Env, sink: LogSink = console): SelfPlayResult {
  const logger = createLogger("draughts", env.DRAUGHTS_LOG_LEVEL, sink);
  const options: GameOptions = { size: env.DRAUGHTS_BOARD_SIZE, tieMax: env.DRAUGHTS_TIE_MAX };
  const seed = env.DRAUGHTS_SEED ?? String(randomSeed());

  const game = new Game(options);
  const players = {
    black: new RandomPlayer({ ...options, color: "B", prng: createPrng(`${seed}:B`) }),
    white: new RandomPlayer({ ...options, color: "W", prng: createPrng(`${seed}:W`) }),
  };

  logger.info(`self-play on ${game.board.size}x${game.board.size}, tieMax ${game.tieMax}, seed ${seed}`);

  const result = playMatch({
    game,
    players,
    maxTurns: env.DRAUGHTS_MAX_TURNS,
    logger: createLogger("match", env.DRAUGHTS_LOG_LEVEL, sink),
    onTurn: ({ game: g }) => logger.debug(`\n${renderBoard(g.snapshot())}`),
  });

  const finalBoard = renderBoard(game.snapshot());
  logger.info(`\n${finalBoard}`);
  logger.info(`result: ${result.status} (black ${game.blackCount}, white ${game.whiteCount})`);

  return { ...result, seed, finalBoard };
}
