export interface Square {
  r: number;
  c: number;
}

export type NodeId = string;

export function parseNodeId(id: string): Square {
  const m = /^r(\d+)c(\d+)$/.exec(id);
  if (!m) throw new Error(`Invalid node id: ${id}`);
  const r = Number(m[1]);
  const c = Number(m[2]);
  if (!Number.isInteger(r) || !Number.isInteger(c)) throw new Error(`Invalid node coordinates in id: ${id}`);
  return { r, c };
}

export function makeNodeId(r: number, c: number): NodeId {
  return `r${r}c${c}`;
}

export function squareId(sq: Square): NodeId {
  return makeNodeId(sq.r, sq.c);
}

export function sameSquare(a: Square, b: Square): boolean {
  return a.r === b.r && a.c === b.c;
}

export function inBounds(r: number, c: number, boardSize: number): boolean {
  return r >= 0 && r < boardSize && c >= 0 && c < boardSize;
}

// Dark squares: (0,1) is dark, (0,0) is light.
export function isDark(r: number, c: number): boolean {
  return (r + c) % 2 === 1;
}

export function isPlayable(r: number, c: number, boardSize: number): boolean {
  return inBounds(r, c, boardSize) && isDark(r, c);
}
