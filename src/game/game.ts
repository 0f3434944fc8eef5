import type { Cell, GameStatus, Player } from "../types.ts";
import { otherPlayer, playerName } from "../types.ts";
import { Board } from "./board.ts";
import { EmptyHistoryError, WrongMoveError } from "./errors.ts";
import { getGameStatus } from "./gameOver.ts";
import { HistoryManager, type UndoRecord } from "./historyManager.ts";
import type { Move } from "./move.ts";
import { generateLegalMoves } from "./movegen.ts";
import { resolveGameOptions, type GameOptions } from "./options.ts";
import { crowned, shouldPromote } from "./promote.ts";

export interface AppliedMove {
  mover: Player;
  captured: number;
  promoted: boolean;
  state: GameStatus;
}

export interface PositionOptions {
  turn?: Player;
  tieMax?: number;
  tieCounter?: number;
}

/**
 * Turn-based English draughts game. Black moves first. The board is mutated
 * in place; every makeMove pushes one undo record so it can be reversed
 * exactly.
 */
export class Game {
  readonly board: Board;
  readonly tieMax: number;

  private _turn: Player = "B";
  private _state: GameStatus = "unfinished";
  private _blackCount: number;
  private _whiteCount: number;
  private _tieCounter = 0;
  private history = new HistoryManager();

  constructor(options: GameOptions = {}) {
    const { size, tieMax } = resolveGameOptions(options);
    this.board = new Board(size);
    this.tieMax = tieMax;
    this._blackCount = this.board.countPieces("B");
    this._whiteCount = this.board.countPieces("W");
  }

  /**
   * Start from an arbitrary position. The board is copied; counts come from
   * the position and the status is evaluated straight away.
   */
  static fromBoard(board: Board, options: PositionOptions = {}): Game {
    const game = new Game({ size: board.size, tieMax: options.tieMax });
    for (let r = 0; r < board.size; r++) {
      for (let c = 0; c < board.size; c++) {
        game.board.setCell(r, c, board.getCell(r, c));
      }
    }
    game._turn = options.turn ?? "B";
    game._tieCounter = options.tieCounter ?? 0;
    game._blackCount = board.countPieces("B");
    game._whiteCount = board.countPieces("W");
    game._state = getGameStatus(game.board, game._turn, game._tieCounter, game.tieMax).status;
    return game;
  }

  get turn(): Player {
    return this._turn;
  }

  get state(): GameStatus {
    return this._state;
  }

  get blackCount(): number {
    return this._blackCount;
  }

  get whiteCount(): number {
    return this._whiteCount;
  }

  get tieCounter(): number {
    return this._tieCounter;
  }

  get historyLength(): number {
    return this.history.size();
  }

  opponent(): Player {
    return otherPlayer(this._turn);
  }

  getAllMoves(): Move[] {
    return generateLegalMoves(this.board, this._turn);
  }

  /**
   * Apply `move` for the side to move. Throws WrongMoveError, leaving the
   * game untouched, if the game is over or the move is not one of
   * getAllMoves().
   */
  makeMove(move: Move): AppliedMove {
    if (this._state !== "unfinished") {
      throw new WrongMoveError(
        `game is over (${this._state})`,
        { move: move.toString(), state: this._state },
        "MOVE_GAME_OVER"
      );
    }

    const legal = this.getAllMoves().find((m) => m.equals(move));
    if (!legal) {
      throw new WrongMoveError(`${move.toString()} is not a legal move for ${playerName(this._turn)}`, {
        move: move.toString(),
        turn: this._turn,
      });
    }

    const mover = this._turn;
    const record = this.history.begin({
      turn: this._turn,
      blackCount: this._blackCount,
      whiteCount: this._whiteCount,
      tieCounter: this._tieCounter,
      state: this._state,
    });

    const { start } = legal;
    const landing = legal.landing();
    const moving = this.board.at(start);
    const captured = legal.capturedSquares();

    this.write(record, start.r, start.c, "darkEmpty");
    for (const sq of captured) {
      this.write(record, sq.r, sq.c, "darkEmpty");
    }
    const promoted = shouldPromote(moving, landing.r, this.board.size);
    this.write(record, landing.r, landing.c, promoted ? crowned(moving) : moving);

    if (captured.length > 0) {
      if (mover === "B") this._whiteCount -= captured.length;
      else this._blackCount -= captured.length;
      this._tieCounter = 0;
    } else {
      this._tieCounter += 1;
    }

    this._turn = otherPlayer(mover);
    this._state = getGameStatus(this.board, this._turn, this._tieCounter, this.tieMax).status;

    return { mover, captured: captured.length, promoted, state: this._state };
  }

  canUndo(): boolean {
    return this.history.canUndo();
  }

  /** Reverse the last makeMove. Throws EmptyHistoryError when there is none. */
  undo(): void {
    const record = this.history.pop();
    if (!record) throw new EmptyHistoryError();

    for (let i = record.changes.length - 1; i >= 0; i--) {
      const { r, c, prev } = record.changes[i];
      this.board.setCell(r, c, prev);
    }
    this._turn = record.turn;
    this._blackCount = record.blackCount;
    this._whiteCount = record.whiteCount;
    this._tieCounter = record.tieCounter;
    this._state = record.state;
  }

  /** Human-readable reason for the current result, or null while unfinished. */
  describeResult(): string | null {
    if (this._state === "unfinished") return null;
    return getGameStatus(this.board, this._turn, this._tieCounter, this.tieMax).reason;
  }

  snapshot(): Cell[][] {
    return this.board.snapshot();
  }

  /** Independent copy, history included, for hypothetical play. */
  clone(): Game {
    const copy = Game.fromBoard(this.board, {
      turn: this._turn,
      tieMax: this.tieMax,
      tieCounter: this._tieCounter,
    });
    copy._state = this._state;
    copy._blackCount = this._blackCount;
    copy._whiteCount = this._whiteCount;
    copy.history = this.history.clone();
    return copy;
  }

  private write(record: UndoRecord, r: number, c: number, cell: Cell): void {
    record.changes.push({ r, c, prev: this.board.getCell(r, c) });
    this.board.setCell(r, c, cell);
  }
}

