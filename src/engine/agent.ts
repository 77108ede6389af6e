import { AgentConfig, DEFAULT_AGENT_CONFIG, InferenceStats, Pos, Rng } from "./types";
import { PosSet, ReadonlyPosSet, inBounds, neighbours } from "./cells";
import { InconsistentKnowledgeError } from "./errors";
import { KnowledgeBase, ReadonlyKnowledgeBase } from "./knowledge";
import { Logger, silentLogger } from "./logger";
import { createRng, pickRandom } from "./rng";
import { Sentence } from "./sentence";

/**
 * Knowledge-based minesweeper player.
 *
 * The game loop reveals a cell, reports its neighbour mine count through
 * `addKnowledge`, and asks for the next move with `makeSafeMove`, falling back
 * to `makeRandomMove` when nothing is proven safe.
 */
export class Agent {
  readonly config: AgentConfig;
  readonly rows: number;
  readonly cols: number;
  private readonly moveSet = new PosSet();
  private readonly safeSet = new PosSet();
  private readonly mineSet = new PosSet();
  private readonly kb = new KnowledgeBase();
  private readonly rng: Rng;
  private readonly logger: Logger;

  constructor(config: Partial<AgentConfig> = {}) {
    this.config = { ...DEFAULT_AGENT_CONFIG, ...config };
    this.rows = this.config.rows;
    this.cols = this.config.cols;
    this.rng = this.config.rng ?? createRng(this.config.seed);
    this.logger = this.config.logger ?? silentLogger;
  }

  get movesMade(): ReadonlyPosSet {
    return this.moveSet;
  }

  get safes(): ReadonlyPosSet {
    return this.safeSet;
  }

  get mines(): ReadonlyPosSet {
    return this.mineSet;
  }

  // Only the inference engine changes the knowledge base
  get knowledge(): ReadonlyKnowledgeBase {
    return this.kb;
  }

  markMine(cell: Pos): void {
    if (this.safeSet.has(cell)) {
      throw new InconsistentKnowledgeError("cell proven safe marked as mine", `(${cell.row},${cell.col})`);
    }
    this.mineSet.add(cell);
    for (const sentence of this.kb) sentence.markMine(cell);
  }

  markSafe(cell: Pos): void {
    if (this.mineSet.has(cell)) {
      throw new InconsistentKnowledgeError("cell proven a mine marked as safe", `(${cell.row},${cell.col})`);
    }
    this.safeSet.add(cell);
    for (const sentence of this.kb) sentence.markSafe(cell);
  }

  /**
   * Records that `cell` was revealed safe with `count` mines around it, then
   * runs inference to a fixpoint.
   */
  addKnowledge(cell: Pos, count: number): InferenceStats {
    if (!inBounds(cell, this.rows, this.cols)) {
      throw new RangeError(`Cell (${cell.row},${cell.col}) is outside a ${this.rows}x${this.cols} board.`);
    }

    this.moveSet.add(cell);
    this.markSafe(cell);

    const unresolved: Pos[] = [];
    let knownMinesAround = 0;
    for (const n of neighbours(cell.row, cell.col, this.rows, this.cols)) {
      if (this.mineSet.has(n)) {
        knownMinesAround++;
        continue;
      }
      if (this.moveSet.has(n) || this.safeSet.has(n)) continue;
      unresolved.push(n);
    }

    // Known mines leave the cell set; the count keeps them unless configured otherwise.
    const adjusted = this.config.subtractKnownMines ? count - knownMinesAround : count;
    this.kb.add(new Sentence(unresolved, adjusted));

    return this.infer();
  }

  /**
   * Alternates extraction and subset resolution until a pass changes nothing.
   * Calling it again at the fixpoint returns zero marks and zero removals.
   */
  infer(): InferenceStats {
    const stats: InferenceStats = { passes: 0, marks: 0, derived: 0, removed: 0 };
    let changed = true;

    while (changed) {
      stats.passes++;
      const marks = this.extract();
      this.kb.normalize();
      const { derived, removed } = this.resolve();

      stats.marks += marks;
      stats.derived += derived;
      stats.removed += removed;
      changed = marks > 0 || removed > 0;

      this.logger.debug(
        `inference pass ${stats.passes}: ${marks} marks, ${derived} derived, ${removed} removed, ${this.kb.size} sentences`,
      );
    }

    return stats;
  }

  // Marks every cell some sentence has settled; returns the count of new marks.
  private extract(): number {
    let marks = 0;
    for (const sentence of this.kb.snapshot()) {
      const mines = sentence.knownMines();
      if (mines) {
        for (const cell of mines) {
          if (this.mineSet.has(cell)) continue;
          this.markMine(cell);
          marks++;
        }
      }
      const safes = sentence.knownSafes();
      if (safes) {
        for (const cell of safes) {
          if (this.safeSet.has(cell)) continue;
          this.markSafe(cell);
          marks++;
        }
      }
    }
    return marks;
  }

  // For each superset/subset pair, appends the difference; then removes each superset once.
  private resolve(): { derived: number; removed: number } {
    const sentences = this.kb.snapshot();
    const supersets: Sentence[] = [];
    const derivations: Sentence[] = [];

    for (const a of sentences) {
      let isSuperset = false;
      for (const b of sentences) {
        if (a === b || a.equals(b)) continue;
        if (!b.isSubsetOf(a)) continue;
        derivations.push(a.subtract(b));
        isSuperset = true;
      }
      if (isSuperset) supersets.push(a);
    }

    let derived = 0;
    for (const s of derivations) {
      if (this.kb.add(s)) derived++;
    }
    let removed = 0;
    for (const s of supersets) {
      if (this.kb.remove(s)) removed++;
    }
    return { derived, removed };
  }

  /** A proven-safe cell not yet played, or null. Does not change any state. */
  makeSafeMove(): Pos | null {
    const candidates: Pos[] = [];
    for (let r = 0; r < this.rows; r++) {
      for (let c = 0; c < this.cols; c++) {
        const p = { row: r, col: c };
        if (this.safeSet.has(p) && !this.moveSet.has(p)) candidates.push(p);
      }
    }
    return pickRandom(candidates, this.rng);
  }

  /**
   * Any cell not yet played and not a known mine, or null when none is left.
   * The cell may still hold a mine.
   */
  makeRandomMove(): Pos | null {
    const candidates: Pos[] = [];
    for (let r = 0; r < this.rows; r++) {
      for (let c = 0; c < this.cols; c++) {
        const p = { row: r, col: c };
        if (!this.moveSet.has(p) && !this.mineSet.has(p)) candidates.push(p);
      }
    }
    const move = pickRandom(candidates, this.rng);
    if (move === null) this.logger.warn("No random move left: every cell is played or a known mine.");
    return move;
  }
}
