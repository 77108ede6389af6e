// ─── Engine tests ───────────────────────────────────────────────────────────

import { describe, it, expect } from "vitest";
import {
  Minesweeper,
  PosSet,
  createRng,
  neighbours,
  pickRandom,
  placeMines,
} from "../src/engine/index";

// ─── RNG determinism ────────────────────────────────────────────────────────

describe("createRng", () => {
  it("produces deterministic sequences", () => {
    const a = createRng(42);
    const b = createRng(42);
    for (let i = 0; i < 100; i++) {
      expect(a()).toBe(b());
    }
  });

  it("different seeds give different sequences", () => {
    const a = createRng(1);
    const b = createRng(2);
    // Very unlikely they'd all match
    let same = true;
    for (let i = 0; i < 20; i++) {
      if (a() !== b()) same = false;
    }
    expect(same).toBe(false);
  });

  it("stays within [0, 1)", () => {
    const rng = createRng(7);
    for (let i = 0; i < 1000; i++) {
      const v = rng();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });
});

describe("pickRandom", () => {
  it("returns null for an empty list", () => {
    expect(pickRandom([], createRng(1))).toBeNull();
  });

  it("maps the rng value onto an index", () => {
    expect(pickRandom(["a", "b", "c", "d"], () => 0)).toBe("a");
    expect(pickRandom(["a", "b", "c", "d"], () => 0.5)).toBe("c");
    expect(pickRandom(["a", "b", "c", "d"], () => 0.99)).toBe("d");
  });
});

// ─── Neighbours ─────────────────────────────────────────────────────────────

describe("neighbours", () => {
  it("returns 8 neighbours for a centre cell", () => {
    expect(neighbours(5, 5, 10, 10)).toHaveLength(8);
  });

  it("returns 3 neighbours for a corner cell", () => {
    expect(neighbours(0, 0, 10, 10)).toEqual([
      { row: 0, col: 1 },
      { row: 1, col: 0 },
      { row: 1, col: 1 },
    ]);
  });

  it("returns 5 neighbours for an edge cell", () => {
    expect(neighbours(0, 5, 10, 10)).toHaveLength(5);
  });

  it("never includes the cell itself", () => {
    const n = neighbours(1, 1, 3, 3);
    expect(n.some((p) => p.row === 1 && p.col === 1)).toBe(false);
  });
});

// ─── PosSet ─────────────────────────────────────────────────────────────────

describe("PosSet", () => {
  it("compares cells by value", () => {
    const set = new PosSet([{ row: 1, col: 2 }]);
    expect(set.has({ row: 1, col: 2 })).toBe(true);
    expect(set.add({ row: 1, col: 2 })).toBe(false);
    expect(set.size).toBe(1);
  });

  it("computes subset and difference", () => {
    const a = new PosSet([
      { row: 0, col: 0 },
      { row: 0, col: 1 },
      { row: 0, col: 2 },
    ]);
    const b = new PosSet([
      { row: 0, col: 1 },
      { row: 0, col: 0 },
    ]);
    expect(b.isSubsetOf(a)).toBe(true);
    expect(a.isSubsetOf(b)).toBe(false);
    expect(a.difference(b).toArray()).toEqual([{ row: 0, col: 2 }]);
    expect(b.equals(new PosSet([{ row: 0, col: 0 }, { row: 0, col: 1 }]))).toBe(true);
  });

  it("renders cells in row-major order", () => {
    const set = new PosSet([
      { row: 2, col: 0 },
      { row: 0, col: 1 },
      { row: 0, col: 0 },
    ]);
    expect(set.toString()).toBe("{(0,0), (0,1), (2,0)}");
  });

  it("stores its own copy of each cell", () => {
    const p = { row: 1, col: 1 };
    const set = new PosSet([p]);
    p.row = 5;
    expect(set.has({ row: 1, col: 1 })).toBe(true);
  });
});

// ─── Mine placement ─────────────────────────────────────────────────────────

describe("placeMines", () => {
  it("places the requested number of distinct mines", () => {
    const mines = placeMines(4, 4, 5, createRng(1));
    expect(mines.size).toBe(5);
  });

  it("respects excluded positions", () => {
    for (let seed = 0; seed < 20; seed++) {
      const mines = placeMines(3, 3, 8, createRng(seed), [{ row: 1, col: 1 }]);
      expect(mines.size).toBe(8);
      expect(mines.has({ row: 1, col: 1 })).toBe(false);
    }
  });

  it("rejects more mines than eligible cells", () => {
    expect(() => placeMines(2, 2, 5, createRng(1))).toThrow(RangeError);
    expect(() => placeMines(2, 2, 4, createRng(1), [{ row: 0, col: 0 }])).toThrow(RangeError);
  });
});

// ─── Board oracle ───────────────────────────────────────────────────────────

describe("Minesweeper", () => {
  it("same seed gives the same layout", () => {
    const a = new Minesweeper({ rows: 8, cols: 8, minesTotal: 10, seed: 99 });
    const b = new Minesweeper({ rows: 8, cols: 8, minesTotal: 10, seed: 99 });
    expect(a.mines).toEqual(b.mines);
    expect(a.mines).toHaveLength(10);
  });

  it("fills the whole board when asked", () => {
    const board = new Minesweeper({ rows: 3, cols: 3, minesTotal: 9, seed: 1 });
    expect(board.mines).toHaveLength(9);
  });

  it("answers mine and neighbour-count queries", () => {
    const board = Minesweeper.withMines(3, 3, [
      { row: 0, col: 0 },
      { row: 0, col: 2 },
    ]);
    expect(board.config.minesTotal).toBe(2);
    expect(board.isMine({ row: 0, col: 0 })).toBe(true);
    expect(board.isMine({ row: 1, col: 1 })).toBe(false);
    expect(board.nearbyMines({ row: 1, col: 1 })).toBe(2);
    expect(board.nearbyMines({ row: 0, col: 1 })).toBe(2);
    expect(board.nearbyMines({ row: 1, col: 0 })).toBe(1);
    expect(board.nearbyMines({ row: 2, col: 2 })).toBe(0);
    // The cell's own mine is not counted
    expect(board.nearbyMines({ row: 0, col: 0 })).toBe(0);
  });

  it("is won only when the flags match the mines exactly", () => {
    const board = Minesweeper.withMines(3, 3, [{ row: 0, col: 0 }]);
    expect(board.won()).toBe(false);
    board.flag({ row: 0, col: 0 });
    expect(board.won()).toBe(true);
    board.flag({ row: 1, col: 1 });
    expect(board.won()).toBe(false);
  });

  it("rejects mines outside the board", () => {
    expect(() => Minesweeper.withMines(2, 2, [{ row: 2, col: 0 }])).toThrow(RangeError);
  });
});
