/**
 * Raised when the agent's own knowledge stops being self-consistent: a
 * sentence whose count falls outside [0, |cells|], or a cell proven both safe
 * and a mine. It points at a fault in the inference state, not in the caller's
 * input, so the agent should not keep playing after it.
 */
export class InconsistentKnowledgeError extends Error {
  readonly reason: string;

  constructor(reason: string, detail?: string) {
    super(detail ? `${reason}: ${detail}` : reason);
    this.name = "InconsistentKnowledgeError";
    this.reason = reason;
  }
}
