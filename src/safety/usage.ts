export interface UsageTracker {
  increment(category: string, word: string): void;
}

/**
 * Counts how often each magic word is picked, keyed by category
 */
export class InMemoryUsageTracker implements UsageTracker {
  private counts: Map<string, Map<string, number>> = new Map();

  increment(category: string, word: string): void {
    let words = this.counts.get(category);
    if (!words) {
      words = new Map();
      this.counts.set(category, words);
    }
    words.set(word, (words.get(word) ?? 0) + 1);
  }

  getCount(category: string, word: string): number {
    return this.counts.get(category)?.get(word) ?? 0;
  }

  snapshot(): Record<string, Record<string, number>> {
    const out: Record<string, Record<string, number>> = {};
    for (const [category, words] of this.counts) {
      out[category] = Object.fromEntries(words);
    }
    return out;
  }
}
