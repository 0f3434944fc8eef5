import type { Player } from "../types.ts";
import { playerName } from "../types.ts";
import { WrongMoveError } from "../game/errors.ts";
import { Game } from "../game/game.ts";
import type { Move } from "../game/move.ts";
import type { GameOptions } from "../game/options.ts";
import { createPrng, type Prng } from "../shared/prng.ts";
import type { MovePicker } from "./aiTypes.ts";

export interface RandomPlayerOptions extends GameOptions {
  color: Player;
  prng?: Prng;
}

/**
 * Picks a uniformly random legal move. Keeps a private Game that mirrors the
 * real one: the opponent's move is replayed on it before choosing.
 */
export class RandomPlayer implements MovePicker {
  readonly color: Player;
  private game: Game;
  private prng: Prng;

  constructor(options: RandomPlayerOptions) {
    const { color, prng, ...gameOptions } = options;
    this.color = color;
    this.game = new Game(gameOptions);
    this.prng = prng ?? createPrng();
  }

  makeMove(opponentMove?: Move): Move {
    if (opponentMove) this.game.makeMove(opponentMove);

    if (this.game.turn !== this.color) {
      throw new WrongMoveError(`it is not ${playerName(this.color)}'s turn`, { turn: this.game.turn });
    }

    const moves = this.game.getAllMoves();
    if (moves.length === 0) {
      throw new WrongMoveError(`${playerName(this.color)} has no legal moves`, { state: this.game.state });
    }

    const move = this.prng.pick(moves);
    this.game.makeMove(move);
    return move.clone();
  }
}
