import type { Logger } from "./logger";

export interface Pos {
  row: number;
  col: number;
}

// Returns a float in [0, 1), like Math.random
export type Rng = () => number;

export interface AgentConfig {
  rows: number;
  cols: number;
  seed: number;
  rng?: Rng;            // overrides seed when given
  // Reduce a new sentence's count by the known mines dropped from its cells
  subtractKnownMines: boolean;
  logger?: Logger;
}

export interface BoardConfig {
  rows: number;
  cols: number;
  minesTotal: number;
  seed: number;
}

export interface InferenceStats {
  passes: number;
  marks: number;    // new global mine/safe marks
  derived: number;  // sentences appended by resolution
  removed: number;  // superset sentences removed
}

/** Default agent config */
export const DEFAULT_AGENT_CONFIG: AgentConfig = {
  rows: 8,
  cols: 8,
  seed: Date.now(),
  subtractKnownMines: false,
};

/** Default board config */
export const DEFAULT_BOARD_CONFIG: BoardConfig = {
  rows: 8,
  cols: 8,
  minesTotal: 8,
  seed: Date.now(),
};
