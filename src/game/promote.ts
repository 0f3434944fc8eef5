import type { Cell, Player } from "../types.ts";
import { cellFor, pieceAt } from "../types.ts";

/** Black crowns on the bottom row; White on the top row. */
export function promotionRow(player: Player, boardSize: number): number {
  return player === "B" ? boardSize - 1 : 0;
}

/**
 * Check whether the piece in `cell` would be crowned on `row`.
 * Kings never promote (and never demote).
 */
export function shouldPromote(cell: Cell, row: number, boardSize: number): boolean {
  const piece = pieceAt(cell);
  if (!piece || piece.rank !== "man") return false;
  return row === promotionRow(piece.owner, boardSize);
}

export function crowned(cell: Cell): Cell {
  const piece = pieceAt(cell);
  if (!piece) return cell;
  return cellFor({ owner: piece.owner, rank: "king" });
}
