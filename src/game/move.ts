import { sameSquare, squareId, type Square } from "./coords.ts";

/**
 * A single piece's move: where it starts and every square it lands on, in
 * order. One one-square step is a quiet move; two-square steps are jumps.
 * `add` does no validation; legality is checked by the move generator and
 * by Game.makeMove.
 */
export class Move {
  readonly start: Square;
  readonly steps: Square[];

  constructor(start: Square, steps: readonly Square[] = []) {
    this.start = { r: start.r, c: start.c };
    this.steps = steps.map((s) => ({ r: s.r, c: s.c }));
  }

  add(step: Square): void {
    this.steps.push({ r: step.r, c: step.c });
  }

  isCapture(): boolean {
    const first = this.steps[0];
    if (!first) return false;
    return Math.abs(first.r - this.start.r) === 2;
  }

  landing(): Square {
    return this.steps[this.steps.length - 1] ?? this.start;
  }

  /** Midpoints of each two-square jump, in chain order. */
  capturedSquares(): Square[] {
    if (!this.isCapture()) return [];
    const out: Square[] = [];
    let prev = this.start;
    for (const step of this.steps) {
      out.push({ r: (prev.r + step.r) / 2, c: (prev.c + step.c) / 2 });
      prev = step;
    }
    return out;
  }

  equals(other: Move): boolean {
    if (!sameSquare(this.start, other.start)) return false;
    if (this.steps.length !== other.steps.length) return false;
    return this.steps.every((s, i) => {
      const o = other.steps[i];
      return o !== undefined && sameSquare(s, o);
    });
  }

  clone(): Move {
    return new Move(this.start, this.steps);
  }

  toString(): string {
    return [this.start, ...this.steps].map(squareId).join(" -> ");
  }
}
