import { ProviderParser } from '../types';

export class WiseParser implements ProviderParser {
  account = 'Wise';

  getSearchTerms(): string[] {
    return ['from:noreply@wise.com ("You spent" OR "is now in")'];
  }

  matchesSender(from: string): boolean {
    return from.toLowerCase().includes('wise.com');
  }

  describe(text: string): string | null {
    // "You spent 45.67 EUR at Coffee Shop." (merchant runs up to the first period)
    const match = text.match(/You spent ([\d,.]+) ([A-Z]{3}) at ([^.]+)/);
    if (!match) return null;

    const [, amount, currency, merchant] = match;
    return `You spent ${amount} ${currency} at ${merchant.trim()}.`;
  }
}
