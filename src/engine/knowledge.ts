import { ReadonlySentence, Sentence } from "./sentence";

/** Query-only view of a KnowledgeBase. */
export interface ReadonlyKnowledgeBase extends Iterable<ReadonlySentence> {
  readonly size: number;
  snapshot(): ReadonlySentence[];
  toString(): string;
}

/**
 * Ordered collection of sentences held true by one agent.
 *
 * Insertion is canonical: vacuous sentences (no cells, no mines) and sentences
 * value-equal to one already held are not appended. Sentences shrink in place
 * as cells get marked, so `normalize` re-applies the same rule afterwards.
 */
export class KnowledgeBase implements ReadonlyKnowledgeBase {
  private sentences: Sentence[] = [];

  get size(): number {
    return this.sentences.length;
  }

  [Symbol.iterator](): Iterator<Sentence> {
    return this.sentences[Symbol.iterator]();
  }

  /** Copy of the current list, safe to iterate while the base changes. */
  snapshot(): Sentence[] {
    return this.sentences.slice();
  }

  /** Returns true if the sentence was appended. */
  add(sentence: Sentence): boolean {
    if (sentence.isVacuous()) return false;
    if (this.sentences.some((s) => s.equals(sentence))) return false;
    this.sentences.push(sentence);
    return true;
  }

  /** Removes the first sentence value-equal to `sentence`. */
  remove(sentence: Sentence): boolean {
    const idx = this.sentences.findIndex((s) => s.equals(sentence));
    if (idx === -1) return false;
    this.sentences.splice(idx, 1);
    return true;
  }

  /** Drops vacuous sentences and later duplicates. Returns how many went. */
  normalize(): number {
    const before = this.sentences.length;
    const kept: Sentence[] = [];
    for (const s of this.sentences) {
      if (s.isVacuous()) continue;
      if (kept.some((k) => k.equals(s))) continue;
      kept.push(s);
    }
    this.sentences = kept;
    return before - kept.length;
  }

  toString(): string {
    return this.sentences.map((s) => s.toString()).join("\n");
  }
}
