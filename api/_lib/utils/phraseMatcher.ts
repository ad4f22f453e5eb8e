// api/_lib/utils/phraseMatcher.ts
// Aho-Corasick automaton over characters for multi-phrase substring matching
// Used by the intensity lexicons, theme detection and the keyword classifier

export interface PhraseMatch<T> {
  phrase: string;
  /** Code-point offsets into the searched text, end inclusive */
  start: number;
  end: number;
  data: T;
}

interface PhraseOutput<T> {
  phrase: string;
  length: number;
  data: T;
}

class PhraseNode<T> {
  children = new Map<string, PhraseNode<T>>();
  failure: PhraseNode<T> | null = null;
  /** Phrases ending exactly here */
  phrases: PhraseOutput<T>[] = [];
  /** phrases plus every suffix match reachable through failure links; filled by build() */
  output: PhraseOutput<T>[] = [];
}

export class PhraseMatcher<T> {
  private root = new PhraseNode<T>();
  private built = false;
  private phraseCount = 0;

  /**
   * Add a phrase; matching is exact on characters, so callers lower-case
   * both the phrases and the searched text when they want case-insensitivity.
   * Empty phrases are ignored.
   */
  addPattern(phrase: string, data: T): void {
    const chars = Array.from(phrase);
    if (chars.length === 0) return;

    let node = this.root;
    for (const ch of chars) {
      let next = node.children.get(ch);
      if (!next) {
        next = new PhraseNode<T>();
        node.children.set(ch, next);
      }
      node = next;
    }

    node.phrases.push({ phrase, length: chars.length, data });
    this.built = false;
    this.phraseCount++;
  }

  addPatterns(phrases: Iterable<{ phrase: string; data: T }>): void {
    for (const { phrase, data } of phrases) {
      this.addPattern(phrase, data);
    }
  }

  // Failure links, breadth first
  private build(): void {
    if (this.built) return;

    const queue: PhraseNode<T>[] = [];
    for (const child of this.root.children.values()) {
      child.failure = this.root;
      child.output = [...child.phrases];
      queue.push(child);
    }

    for (let head = 0; head < queue.length; head++) {
      const current = queue[head];

      for (const [ch, child] of current.children) {
        queue.push(child);

        let failure = current.failure;
        while (failure !== null && !failure.children.has(ch)) {
          failure = failure.failure;
        }
        child.failure = failure?.children.get(ch) ?? this.root;
        // Own phrases first, then suffix matches inherited through the failure link
        child.output = [...child.phrases, ...child.failure.output];
      }
    }

    this.built = true;
  }

  /** Every occurrence of every phrase, overlapping ones included, in text order. */
  search(text: string): PhraseMatch<T>[] {
    this.build();

    const results: PhraseMatch<T>[] = [];
    let node = this.root;
    let i = 0;

    for (const ch of text) {
      while (node !== this.root && !node.children.has(ch)) {
        node = node.failure ?? this.root;
      }
      node = node.children.get(ch) ?? this.root;

      for (const out of node.output) {
        results.push({ phrase: out.phrase, start: i - out.length + 1, end: i, data: out.data });
      }
      i++;
    }

    return results;
  }

  /** True as soon as any phrase occurs in the text. */
  matchesAny(text: string): boolean {
    this.build();

    let node = this.root;
    for (const ch of text) {
      while (node !== this.root && !node.children.has(ch)) {
        node = node.failure ?? this.root;
      }
      node = node.children.get(ch) ?? this.root;
      if (node.output.length > 0) return true;
    }
    return false;
  }

  clear(): void {
    this.root = new PhraseNode<T>();
    this.built = false;
    this.phraseCount = 0;
  }

  getStats() {
    return {
      phraseCount: this.phraseCount,
      isBuilt: this.built,
      hasPhrases: this.phraseCount > 0,
    };
  }
}

export function createPhraseMatcher<T>(phrases: Iterable<{ phrase: string; data: T }> = []): PhraseMatcher<T> {
  const matcher = new PhraseMatcher<T>();
  matcher.addPatterns(phrases);
  return matcher;
}
