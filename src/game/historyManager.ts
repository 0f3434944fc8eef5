import type { Cell, GameStatus, Player } from "../types.ts";

export interface CellChange {
  r: number;
  c: number;
  prev: Cell;
}

/** Everything needed to reverse one makeMove call verbatim. */
export interface UndoRecord {
  changes: CellChange[];
  turn: Player;
  blackCount: number;
  whiteCount: number;
  tieCounter: number;
  state: GameStatus;
}

export type UndoScalars = Omit<UndoRecord, "changes">;

/**
 * Change log for undo. Each makeMove opens one record, appends the prior
 * value of every cell it overwrites, and the whole record is popped and
 * replayed in reverse by undo.
 */
export class HistoryManager {
  private records: UndoRecord[] = [];

  begin(scalars: UndoScalars): UndoRecord {
    const record: UndoRecord = { ...scalars, changes: [] };
    this.records.push(record);
    return record;
  }

  pop(): UndoRecord | null {
    return this.records.pop() ?? null;
  }

  canUndo(): boolean {
    return this.records.length > 0;
  }

  size(): number {
    return this.records.length;
  }

  clear(): void {
    this.records = [];
  }

  clone(): HistoryManager {
    const copy = new HistoryManager();
    copy.records = this.records.map((rec) => ({
      ...rec,
      changes: rec.changes.map((ch) => ({ ...ch })),
    }));
    return copy;
  }
}
