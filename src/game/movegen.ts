import type { Piece, Player } from "../types.ts";
import { isEmptyCell, pieceAt } from "../types.ts";
import type { Board } from "./board.ts";
import { inBounds, isPlayable, type Square } from "./coords.ts";
import { Move } from "./move.ts";
import { shouldPromote } from "./promote.ts";

type Delta = { dr: number; dc: number };

interface Jump {
  over: Square;
  to: Square;
}

export function pieceDirections(piece: Piece): Delta[] {
  if (piece.rank === "man") {
    const dr = piece.owner === "B" ? +1 : -1; // Black forward +1, White forward -1
    return [
      { dr, dc: -1 },
      { dr, dc: +1 },
    ];
  }
  // King: any diagonal
  return [
    { dr: -1, dc: -1 },
    { dr: -1, dc: +1 },
    { dr: +1, dc: -1 },
    { dr: +1, dc: +1 },
  ];
}

function isEmptyAt(board: Board, r: number, c: number): boolean {
  const cell = board.peek(r, c);
  return cell !== null && isEmptyCell(cell);
}

function isEnemyAt(board: Board, r: number, c: number, player: Player): boolean {
  const cell = board.peek(r, c);
  if (cell === null) return false;
  const piece = pieceAt(cell);
  return piece !== null && piece.owner !== player;
}

function jumpsFrom(board: Board, from: Square, piece: Piece): Jump[] {
  const out: Jump[] = [];
  for (const { dr, dc } of pieceDirections(piece)) {
    const overR = from.r + dr;
    const overC = from.c + dc;
    const toR = from.r + 2 * dr;
    const toC = from.c + 2 * dc;
    if (!inBounds(overR, overC, board.size) || !isPlayable(toR, toC, board.size)) continue;
    if (!isEnemyAt(board, overR, overC, piece.owner)) continue; // must jump over enemy
    if (!isEmptyAt(board, toR, toC)) continue; // landing must be empty
    out.push({ over: { r: overR, c: overC }, to: { r: toR, c: toC } });
  }
  return out;
}

function ownPieceAt(board: Board, sq: Square, player: Player): Piece | null {
  const piece = pieceAt(board.at(sq));
  if (!piece || piece.owner !== player) return null;
  return piece;
}

/**
 * Depth-first search over jump continuations on a scratch board. Jumped
 * pieces are lifted as soon as they are jumped and put back when the search
 * backtracks, so a piece can never be jumped twice and every path ends after
 * at most as many jumps as the opponent has pieces.
 */
function extendChain(scratch: Board, origin: Square, at: Square, path: Square[], out: Move[]): void {
  const cell = scratch.at(at);
  const piece = pieceAt(cell);
  const jumps = piece ? jumpsFrom(scratch, at, piece) : [];

  if (jumps.length === 0) {
    if (path.length > 0) out.push(new Move(origin, path));
    return;
  }

  for (const { over, to } of jumps) {
    const overCell = scratch.at(over);
    scratch.setCell(at.r, at.c, "darkEmpty");
    scratch.setCell(over.r, over.c, "darkEmpty");
    scratch.setCell(to.r, to.c, cell);
    path.push(to);

    if (shouldPromote(cell, to.r, scratch.size)) {
      // A man crowned mid-capture ends its move on the promotion row.
      out.push(new Move(origin, path));
    } else {
      extendChain(scratch, origin, to, path, out);
    }

    path.pop();
    scratch.setCell(to.r, to.c, "darkEmpty");
    scratch.setCell(over.r, over.c, overCell);
    scratch.setCell(at.r, at.c, cell);
  }
}

/** Every maximal capture chain for the piece on `from` (empty if none). */
export function captureChainsFrom(board: Board, from: Square): Move[] {
  const piece = pieceAt(board.at(from));
  if (!piece || jumpsFrom(board, from, piece).length === 0) return [];

  const out: Move[] = [];
  extendChain(board.clone(), from, from, [], out);
  return out;
}

export function canCaptureFrom(board: Board, from: Square): boolean {
  const piece = pieceAt(board.at(from));
  return piece !== null && jumpsFrom(board, from, piece).length > 0;
}

function ownSquares(board: Board, player: Player): Square[] {
  const out: Square[] = [];
  for (let r = 0; r < board.size; r++) {
    for (let c = 0; c < board.size; c++) {
      if (ownPieceAt(board, { r, c }, player)) out.push({ r, c });
    }
  }
  return out;
}

export function hasAnyCapture(board: Board, player: Player): boolean {
  return ownSquares(board, player).some((sq) => canCaptureFrom(board, sq));
}

export function generateCaptureMoves(board: Board, player: Player): Move[] {
  const moves: Move[] = [];
  for (const sq of ownSquares(board, player)) {
    moves.push(...captureChainsFrom(board, sq));
  }
  return moves;
}

export function generateQuietMoves(board: Board, player: Player): Move[] {
  const moves: Move[] = [];
  for (const from of ownSquares(board, player)) {
    const piece = ownPieceAt(board, from, player);
    if (!piece) continue;
    for (const { dr, dc } of pieceDirections(piece)) {
      const nr = from.r + dr;
      const nc = from.c + dc;
      if (!isPlayable(nr, nc, board.size) || !isEmptyAt(board, nr, nc)) continue;
      moves.push(new Move(from, [{ r: nr, c: nc }]));
    }
  }
  return moves;
}

export function generateLegalMoves(board: Board, player: Player): Move[] {
  const captures = generateCaptureMoves(board, player);
  if (captures.length > 0) return captures; // mandatory capture
  return generateQuietMoves(board, player);
}
