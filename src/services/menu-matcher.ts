import type { Category, Menu, MenuEntry } from "../models/menu.js";

export interface MatchResult<T> {
  match: T | null;
  confidence: number;
  alternatives: T[];
}

/**
 * Fuzzy matches requested names to menu entries
 * Uses simple string matching over names and aliases
 */
export class MenuMatcher {
  private menu: Menu;

  constructor(menu: Menu) {
    this.menu = menu;
  }

  /**
   * Normalize text for matching (lowercase, remove punctuation)
   */
  private normalize(text: string): string {
    return text.toLowerCase().replace(/[^a-z0-9\s]/g, "").trim();
  }

  /**
   * Calculate similarity between two strings (0-1)
   */
  private similarity(a: string, b: string): number {
    const aNorm = this.normalize(a);
    const bNorm = this.normalize(b);

    if (aNorm === "" || bNorm === "") return 0;
    if (aNorm === bNorm) return 1;
    if (aNorm.includes(bNorm) || bNorm.includes(aNorm)) return 0.9;

    // Simple word overlap score
    const aWords = new Set(aNorm.split(/\s+/));
    const bWords = new Set(bNorm.split(/\s+/));
    const intersection = [...aWords].filter((w) => bWords.has(w));
    const union = new Set([...aWords, ...bWords]);

    return intersection.length / union.size;
  }

  /**
   * Find best matching menu entry, optionally within one category
   */
  findItem(text: string, category?: Category): MatchResult<MenuEntry> {
    const candidates: Array<{ entry: MenuEntry; score: number }> = [];

    for (const entry of this.menu.items) {
      if (!entry.available) continue;
      if (category && entry.category !== category) continue;

      let bestScore = this.similarity(text, entry.name);

      for (const alias of entry.aliases) {
        const score = this.similarity(text, alias);
        if (score > bestScore) bestScore = score;
      }

      if (bestScore > 0.3) {
        candidates.push({ entry, score: bestScore });
      }
    }

    // Stable sort keeps menu order among equal scores
    candidates.sort((a, b) => b.score - a.score);

    const [best, ...rest] = candidates;
    if (!best) {
      return { match: null, confidence: 0, alternatives: [] };
    }

    return {
      match: best.entry,
      confidence: best.score,
      alternatives: rest.slice(0, 3).map((c) => c.entry),
    };
  }

  /**
   * Get all available entries in a category
   */
  getItemsByCategory(category: Category): MenuEntry[] {
    return this.menu.items.filter((entry) => entry.available && entry.category === category);
  }
}
