/**
 * Engine errors. Every error the rules engine throws extends DraughtsError and
 * carries a code for programmatic handling plus a context bag for debugging.
 */

export type DraughtsErrorCode =
  | "BOARD_OUT_OF_BOUNDS"
  | "MOVE_NOT_LEGAL"
  | "MOVE_GAME_OVER"
  | "HISTORY_EMPTY"
  | "OPTIONS_INVALID";

export class DraughtsError extends Error {
  readonly code: DraughtsErrorCode;
  readonly context: Record<string, unknown>;

  constructor(code: DraughtsErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = "DraughtsError";
    this.code = code;
    this.context = context;
    Object.setPrototypeOf(this, DraughtsError.prototype);
  }
}

/** Board accessor called outside `[0, size)`. Always a caller bug. */
export class OutOfBoundsError extends DraughtsError {
  constructor(row: number, col: number, size: number) {
    super(
      "BOARD_OUT_OF_BOUNDS",
      `row and col indices must be between 0 and ${size - 1} (got r${row}c${col})`,
      { row, col, size }
    );
    this.name = "OutOfBoundsError";
    Object.setPrototypeOf(this, OutOfBoundsError.prototype);
  }
}

/** A move that is not in the current legal-move set, or any move after the game ended. */
export class WrongMoveError extends DraughtsError {
  constructor(
    message: string,
    context: Record<string, unknown> = {},
    code: "MOVE_NOT_LEGAL" | "MOVE_GAME_OVER" = "MOVE_NOT_LEGAL"
  ) {
    super(code, message, context);
    this.name = "WrongMoveError";
    Object.setPrototypeOf(this, WrongMoveError.prototype);
  }
}

export class EmptyHistoryError extends DraughtsError {
  constructor() {
    super("HISTORY_EMPTY", "nothing to undo");
    this.name = "EmptyHistoryError";
    Object.setPrototypeOf(this, EmptyHistoryError.prototype);
  }
}

export class InvalidOptionsError extends DraughtsError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super("OPTIONS_INVALID", message, context);
    this.name = "InvalidOptionsError";
    Object.setPrototypeOf(this, InvalidOptionsError.prototype);
  }
}

export function isDraughtsError(err: unknown): err is DraughtsError {
  return err instanceof DraughtsError;
}
