export type Player = "B" | "W";
export type Rank = "man" | "king";

export type Cell =
  | "darkEmpty"
  | "lightEmpty"
  | "blackMan"
  | "whiteMan"
  | "blackKing"
  | "whiteKing";

export interface Piece { owner: Player; rank: Rank; }

export type GameStatus = "unfinished" | "blackWon" | "whiteWon" | "tie";

export function pieceAt(cell: Cell): Piece | null {
  switch (cell) {
    case "blackMan":
      return { owner: "B", rank: "man" };
    case "whiteMan":
      return { owner: "W", rank: "man" };
    case "blackKing":
      return { owner: "B", rank: "king" };
    case "whiteKing":
      return { owner: "W", rank: "king" };
    case "darkEmpty":
    case "lightEmpty":
      return null;
  }
}

export function cellFor(piece: Piece): Cell {
  if (piece.owner === "B") return piece.rank === "king" ? "blackKing" : "blackMan";
  return piece.rank === "king" ? "whiteKing" : "whiteMan";
}

export function isEmptyCell(cell: Cell): boolean {
  return cell === "darkEmpty" || cell === "lightEmpty";
}

export function otherPlayer(p: Player): Player {
  return p === "B" ? "W" : "B";
}

export function playerName(p: Player): "Black" | "White" {
  return p === "B" ? "Black" : "White";
}
