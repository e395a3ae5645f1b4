export interface CategoryHint {
  match: string; // case-insensitive substring of the merchant name
  category: string;
}

export interface RulesConfig {
  category_hints: CategoryHint[];
}

// Merchants the model is known to get wrong
export const DEFAULT_CATEGORY_HINTS: CategoryHint[] = [
  { match: 'OpenRouter', category: 'Utilities' },
  { match: 'Namecheap', category: 'Utilities' },
  { match: 'Old Peter', category: 'Food & Dining' },
  { match: 'Balam', category: 'Food & Dining' },
  { match: 'City Market', category: 'Grocery' },
  { match: 'Deckers', category: 'Shopping' },
  { match: 'Mood Up', category: 'Shopping' },
  { match: 'Cosmet', category: 'Shopping' },
  { match: 'Casa De Los Cirios', category: 'Food & Dining' },
];

/**
 * Deterministic merchant -> category overrides. A hint always beats the model.
 *
 * When several hints match, the longest `match` wins; on equal length the hint
 * registered last wins, so rules.json entries override the defaults.
 */
export class RulesEngine {
  private hints: CategoryHint[];

  constructor(hints: CategoryHint[] = DEFAULT_CATEGORY_HINTS) {
    this.hints = hints.filter(h => h.match.trim().length > 0);
  }

  getHints(): CategoryHint[] {
    return [...this.hints];
  }

  categoryFor(merchant: string): string | undefined {
    const name = merchant.toLowerCase();
    let best: CategoryHint | undefined;

    for (const hint of this.hints) {
      if (!name.includes(hint.match.toLowerCase())) continue;
      if (!best || hint.match.length >= best.match.length) {
        best = hint;
      }
    }

    return best?.category;
  }

  /**
   * Returns a copy of `record` with its category replaced when a hint matches the merchant.
   */
  apply(record: Record<string, unknown>): Record<string, unknown> {
    const merchant = record.merchant;
    if (typeof merchant !== 'string') return record;

    const category = this.categoryFor(merchant);
    if (!category || category === record.category) return record;

    return { ...record, category };
  }
}
