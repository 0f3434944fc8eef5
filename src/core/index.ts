// "Core" is the stable, deterministic rules surface (no I/O, no rendering).

export type { Cell, GameStatus, Piece, Player, Rank } from "../types.ts";
export { cellFor, isEmptyCell, otherPlayer, pieceAt, playerName } from "../types.ts";

export type { NodeId, Square } from "../game/coords.ts";
export { makeNodeId, parseNodeId, sameSquare, squareId } from "../game/coords.ts";

export { Board } from "../game/board.ts";
export { Move } from "../game/move.ts";
export {
  canCaptureFrom,
  captureChainsFrom,
  generateCaptureMoves,
  generateLegalMoves,
  generateQuietMoves,
  hasAnyCapture,
} from "../game/movegen.ts";
export { Game } from "../game/game.ts";
export type { AppliedMove, PositionOptions } from "../game/game.ts";
export { getGameStatus } from "../game/gameOver.ts";
export type { GameOverCheck } from "../game/gameOver.ts";
export { promotionRow } from "../game/promote.ts";
export { defaultTieMax, resolveGameOptions } from "../game/options.ts";
export type { GameOptions, ResolvedGameOptions } from "../game/options.ts";
export { formatMove, parseMove, squareToNumber, numberToSquare } from "../game/coordFormat.ts";

export {
  DraughtsError,
  EmptyHistoryError,
  InvalidOptionsError,
  OutOfBoundsError,
  WrongMoveError,
  isDraughtsError,
} from "../game/errors.ts";
export type { DraughtsErrorCode } from "../game/errors.ts";

export { renderBoard, parseBoard } from "../render/boardText.ts";
export { RandomPlayer } from "../ai/randomPlayer.ts";
export type { MovePicker, MatchPlayers } from "../ai/aiTypes.ts";
export { playMatch } from "../driver/matchDriver.ts";
export type { MatchOptions, MatchResult } from "../driver/matchDriver.ts";
