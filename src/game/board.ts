import type { Cell, Player } from "../types.ts";
import { pieceAt } from "../types.ts";
import { inBounds, isDark, type Square } from "./coords.ts";
import { OutOfBoundsError } from "./errors.ts";
import { DEFAULT_BOARD_SIZE, assertBoardSize } from "./options.ts";

function emptyCellAt(r: number, c: number): Cell {
  return isDark(r, c) ? "darkEmpty" : "lightEmpty";
}

/**
 * Square N×N draughts board. Rows are addressed top to bottom; Black's men
 * start on the top rows and White's on the bottom rows.
 */
export class Board {
  readonly size: number;
  private cells: Cell[][];

  constructor(size: number = DEFAULT_BOARD_SIZE) {
    this.size = assertBoardSize(size);
    this.cells = [];
    this.fillInitial();
  }

  static empty(size: number = DEFAULT_BOARD_SIZE): Board {
    const board = new Board(size);
    board.clear();
    return board;
  }

  /**
   * Resets the board to the starting arrangement: the outer (N-2)/2 rows on
   * each side hold men on dark squares, the two middle rows stay empty.
   */
  fillInitial(): void {
    const pieceRows = (this.size - 2) / 2;
    this.cells = [];
    for (let r = 0; r < this.size; r++) {
      const row: Cell[] = [];
      for (let c = 0; c < this.size; c++) {
        if (!isDark(r, c)) row.push("lightEmpty");
        else if (r < pieceRows) row.push("blackMan");
        else if (r >= this.size - pieceRows) row.push("whiteMan");
        else row.push("darkEmpty");
      }
      this.cells.push(row);
    }
  }

  clear(): void {
    this.cells = [];
    for (let r = 0; r < this.size; r++) {
      const row: Cell[] = [];
      for (let c = 0; c < this.size; c++) row.push(emptyCellAt(r, c));
      this.cells.push(row);
    }
  }

  getCell(row: number, col: number): Cell {
    return this.rowAt(row, col)[col];
  }

  setCell(row: number, col: number, cell: Cell): void {
    this.rowAt(row, col)[col] = cell;
  }

  at(sq: Square): Cell {
    return this.getCell(sq.r, sq.c);
  }

  /** Like getCell, but null for coordinates off the board. */
  peek(row: number, col: number): Cell | null {
    if (!inBounds(row, col, this.size)) return null;
    return this.getCell(row, col);
  }

  /** Read-only copy of the whole grid. */
  snapshot(): Cell[][] {
    return this.cells.map((row) => row.slice());
  }

  clone(): Board {
    const copy = Board.empty(this.size);
    copy.cells = this.snapshot();
    return copy;
  }

  countPieces(player: Player): number {
    let n = 0;
    for (const row of this.cells) {
      for (const cell of row) {
        if (pieceAt(cell)?.owner === player) n++;
      }
    }
    return n;
  }

  equals(other: Board): boolean {
    if (other.size !== this.size) return false;
    for (let r = 0; r < this.size; r++) {
      for (let c = 0; c < this.size; c++) {
        if (this.getCell(r, c) !== other.getCell(r, c)) return false;
      }
    }
    return true;
  }

  private rowAt(row: number, col: number): Cell[] {
    if (!Number.isInteger(row) || !Number.isInteger(col) || !inBounds(row, col, this.size)) throw new OutOfBoundsError(row, col, this.size);
    return this.cells[row];
  }
}
