import { BoardConfig, DEFAULT_BOARD_CONFIG, Pos, Rng } from "./types";
import { PosSet, inBounds, neighbours, posKey } from "./cells";
import { createRng } from "./rng";

interface Bucket {
  items: Pos[];
  indexByKey: Map<string, number>;
}

function addToBucket(bucket: Bucket, pos: Pos): void {
  const key = posKey(pos);
  if (bucket.indexByKey.has(key)) return;
  bucket.indexByKey.set(key, bucket.items.length);
  bucket.items.push(pos);
}

// Swap-remove, O(1)
function takeFromBucket(bucket: Bucket, idx: number): Pos {
  const taken = bucket.items[idx];
  const lastIndex = bucket.items.length - 1;
  const last = bucket.items[lastIndex];
  bucket.items[idx] = last;
  bucket.indexByKey.set(posKey(last), idx);
  bucket.items.pop();
  bucket.indexByKey.delete(posKey(taken));
  return taken;
}

/**
 * Picks `minesTotal` distinct cells uniformly, skipping `excludePositions`.
 */
export function placeMines(
  rows: number,
  cols: number,
  minesTotal: number,
  rng: Rng,
  excludePositions: Pos[] = [],
): PosSet {
  const excludeSet = new PosSet(excludePositions);
  const eligible: Bucket = { items: [], indexByKey: new Map() };
  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      const p = { row: r, col: c };
      if (!excludeSet.has(p)) addToBucket(eligible, p);
    }
  }

  if (minesTotal < 0 || minesTotal > eligible.items.length) {
    throw new RangeError(
      `Cannot place ${minesTotal} mines on ${eligible.items.length} eligible cells.`,
    );
  }

  const mines = new PosSet();
  while (mines.size < minesTotal) {
    const idx = Math.floor(rng() * eligible.items.length);
    mines.add(takeFromBucket(eligible, idx));
  }
  return mines;
}

/**
 * Ground-truth board. Answers mine and neighbour-count queries for the game
 * loop and tracks which mines the player has flagged.
 */
export class Minesweeper {
  readonly config: BoardConfig;
  readonly rows: number;
  readonly cols: number;
  private readonly mineSet: PosSet;
  private readonly flagged = new PosSet();

  constructor(config: Partial<BoardConfig> = {}, mines?: Iterable<Pos>) {
    this.config = { ...DEFAULT_BOARD_CONFIG, ...config };
    this.rows = this.config.rows;
    this.cols = this.config.cols;

    if (mines) {
      this.mineSet = new PosSet();
      for (const m of mines) {
        if (!inBounds(m, this.rows, this.cols)) {
          throw new RangeError(`Mine (${m.row},${m.col}) is outside a ${this.rows}x${this.cols} board.`);
        }
        this.mineSet.add(m);
      }
      this.config.minesTotal = this.mineSet.size;
    } else {
      this.mineSet = placeMines(this.rows, this.cols, this.config.minesTotal, createRng(this.config.seed));
    }
  }

  /** Board with a fixed mine layout. */
  static withMines(rows: number, cols: number, mines: Pos[]): Minesweeper {
    return new Minesweeper({ rows, cols }, mines);
  }

  get mines(): Pos[] {
    return this.mineSet.sorted();
  }

  isMine(cell: Pos): boolean {
    return this.mineSet.has(cell);
  }

  /** Mines in the 8-neighbourhood of `cell`, not counting the cell itself. */
  nearbyMines(cell: Pos): number {
    let count = 0;
    for (const n of neighbours(cell.row, cell.col, this.rows, this.cols)) {
      if (this.mineSet.has(n)) count++;
    }
    return count;
  }

  flag(cell: Pos): void {
    this.flagged.add(cell);
  }

  /** True once the flagged cells are exactly the mines. */
  won(): boolean {
    return this.flagged.equals(this.mineSet);
  }
}
