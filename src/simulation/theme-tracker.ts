/**
 * Repeated-theme detection using Jaccard similarity over word sets.
 */

/** Similarity at or above which two utterances share a theme */
export const THEME_SIMILARITY_THRESHOLD = 0.6;

/** Number of recent utterances compared against */
export const THEME_WINDOW = 5;

/**
 * Tokenize text into normalized words.
 * - Lowercase
 * - Split on whitespace and punctuation
 * - Filter empty strings
 */
export function tokenize(text: string): Set<string> {
  const words = text
    .toLowerCase()
    .split(/[\s\p{P}]+/u)
    .filter((word) => word.length > 0);

  return new Set(words);
}

/**
 * Jaccard index = |A ∩ B| / |A ∪ B|
 */
export function jaccardSimilarity(setA: Set<string>, setB: Set<string>): number {
  if (setA.size === 0 && setB.size === 0) {
    return 1;
  }

  if (setA.size === 0 || setB.size === 0) {
    return 0;
  }

  let intersectionSize = 0;
  const smaller = setA.size <= setB.size ? setA : setB;
  const larger = setA.size <= setB.size ? setB : setA;

  for (const word of smaller) {
    if (larger.has(word)) {
      intersectionSize++;
    }
  }

  const unionSize = setA.size + setB.size - intersectionSize;
  return intersectionSize / unionSize;
}

/**
 * Tracks the last few utterances of a session and flags repeats.
 */
export class ThemeTracker {
  private readonly recent: Set<string>[] = [];
  private readonly threshold: number;
  private readonly window: number;

  constructor(threshold = THEME_SIMILARITY_THRESHOLD, window = THEME_WINDOW) {
    this.threshold = threshold;
    this.window = window;
  }

  /**
   * Record an utterance and report whether it repeats a recent theme.
   * Utterances without words are never repeats and are not recorded.
   */
  observe(text: string): boolean {
    const tokens = tokenize(text);
    if (tokens.size === 0) {
      return false;
    }

    const repeated = this.recent.some((entry) => jaccardSimilarity(entry, tokens) >= this.threshold);

    this.recent.push(tokens);
    if (this.recent.length > this.window) {
      this.recent.shift();
    }

    return repeated;
  }

  clear(): void {
    this.recent.length = 0;
  }
}
