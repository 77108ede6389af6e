import type { Pos } from "./types";

export function posKey(pos: Pos): string {
  return `${pos.row},${pos.col}`;
}

export function comparePos(a: Pos, b: Pos): number {
  return a.row - b.row || a.col - b.col;
}

export function inBounds(pos: Pos, rows: number, cols: number): boolean {
  return pos.row >= 0 && pos.row < rows && pos.col >= 0 && pos.col < cols;
}

/** 8-neighbourhood of (row, col), clipped to the board. */
export function neighbours(row: number, col: number, rows: number, cols: number): Pos[] {
  const result: Pos[] = [];
  for (let dr = -1; dr <= 1; dr++) {
    for (let dc = -1; dc <= 1; dc++) {
      if (dr === 0 && dc === 0) continue;
      const p = { row: row + dr, col: col + dc };
      if (inBounds(p, rows, cols)) result.push(p);
    }
  }
  return result;
}

/** Query-only view of a PosSet. */
export interface ReadonlyPosSet extends Iterable<Pos> {
  readonly size: number;
  has(pos: Pos): boolean;
  toArray(): Pos[];
  sorted(): Pos[];
  isSubsetOf(other: ReadonlyPosSet): boolean;
  difference(other: ReadonlyPosSet): PosSet;
  equals(other: ReadonlyPosSet): boolean;
  toString(): string;
}

/**
 * Set of board cells compared by value. Iteration follows insertion order.
 */
export class PosSet implements ReadonlyPosSet {
  private readonly items = new Map<string, Pos>();

  constructor(cells: Iterable<Pos> = []) {
    for (const c of cells) this.add(c);
  }

  get size(): number {
    return this.items.size;
  }

  has(pos: Pos): boolean {
    return this.items.has(posKey(pos));
  }

  /** Returns true if the cell was not already present. */
  add(pos: Pos): boolean {
    const key = posKey(pos);
    if (this.items.has(key)) return false;
    this.items.set(key, { row: pos.row, col: pos.col });
    return true;
  }

  delete(pos: Pos): boolean {
    return this.items.delete(posKey(pos));
  }

  [Symbol.iterator](): Iterator<Pos> {
    return this.items.values();
  }

  toArray(): Pos[] {
    return [...this.items.values()];
  }

  /** Row-major ordered copy of the cells. */
  sorted(): Pos[] {
    return this.toArray().sort(comparePos);
  }

  isSubsetOf(other: ReadonlyPosSet): boolean {
    if (this.size > other.size) return false;
    for (const pos of this.items.values()) {
      if (!other.has(pos)) return false;
    }
    return true;
  }

  difference(other: ReadonlyPosSet): PosSet {
    const out = new PosSet();
    for (const pos of this.items.values()) {
      if (!other.has(pos)) out.add(pos);
    }
    return out;
  }

  equals(other: ReadonlyPosSet): boolean {
    return this.size === other.size && this.isSubsetOf(other);
  }

  toString(): string {
    return `{${this.sorted().map((p) => `(${p.row},${p.col})`).join(", ")}}`;
  }
}
