import { PosSet, ReadonlyPosSet } from "./cells";
import { InconsistentKnowledgeError } from "./errors";
import type { Pos } from "./types";

/** Query-only view of a Sentence. */
export interface ReadonlySentence {
  readonly cells: ReadonlyPosSet;
  readonly count: number;
  knownMines(): Pos[] | null;
  knownSafes(): Pos[] | null;
  equals(other: ReadonlySentence): boolean;
  toString(): string;
}

/**
 * A logical fact about the board: exactly `count` of `cells` are mines.
 *
 * Cells are removed as they become known; a mine removal also lowers the count,
 * a safe removal does not. The count always stays within [0, |cells|].
 */
export class Sentence implements ReadonlySentence {
  readonly cells: PosSet;
  private _count: number;

  constructor(cells: Iterable<Pos>, count: number) {
    this.cells = new PosSet(cells);
    this._count = count;
    this.assertConsistent();
  }

  get count(): number {
    return this._count;
  }

  /** Every remaining cell, if they must all be mines; null when undecided. */
  knownMines(): Pos[] | null {
    return this.cells.size === this._count ? this.cells.toArray() : null;
  }

  /** Every remaining cell, if none can be a mine; null when undecided. */
  knownSafes(): Pos[] | null {
    return this._count === 0 ? this.cells.toArray() : null;
  }

  markMine(cell: Pos): void {
    if (!this.cells.delete(cell)) return;
    this._count--;
    this.assertConsistent();
  }

  markSafe(cell: Pos): void {
    if (!this.cells.delete(cell)) return;
    this.assertConsistent();
  }

  isSubsetOf(other: Sentence): boolean {
    return this.cells.isSubsetOf(other.cells);
  }

  // Caller guarantees subset.cells ⊆ this.cells
  subtract(subset: Sentence): Sentence {
    return new Sentence(this.cells.difference(subset.cells), this._count - subset._count);
  }

  isVacuous(): boolean {
    return this.cells.size === 0 && this._count === 0;
  }

  equals(other: ReadonlySentence): boolean {
    return this._count === other.count && this.cells.equals(other.cells);
  }

  toString(): string {
    return `${this.cells.toString()} = ${this._count}`;
  }

  private assertConsistent(): void {
    if (!Number.isInteger(this._count) || this._count < 0 || this._count > this.cells.size) {
      throw new InconsistentKnowledgeError("sentence count out of range", this.toString());
    }
  }
}
