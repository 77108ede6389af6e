export { Agent } from "./agent";
export { Sentence } from "./sentence";
export type { ReadonlySentence } from "./sentence";
export { KnowledgeBase } from "./knowledge";
export type { ReadonlyKnowledgeBase } from "./knowledge";
export { Minesweeper, placeMines } from "./board";
export { PosSet, posKey, comparePos, inBounds, neighbours } from "./cells";
export type { ReadonlyPosSet } from "./cells";
export { createRng, pickRandom } from "./rng";
export { InconsistentKnowledgeError } from "./errors";
export { silentLogger } from "./logger";
export type { Logger } from "./logger";
export type {
  AgentConfig,
  BoardConfig,
  InferenceStats,
  Pos,
  Rng,
} from "./types";
export { DEFAULT_AGENT_CONFIG, DEFAULT_BOARD_CONFIG } from "./types";
