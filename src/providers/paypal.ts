import { ProviderParser } from '../types';

export class PayPalParser implements ProviderParser {
  account = 'PayPal';

  getSearchTerms(): string[] {
    return ['from:service@paypal.de "Von Ihnen gezahlt"'];
  }

  matchesSender(from: string): boolean {
    return from.toLowerCase().includes('paypal.de');
  }

  describe(text: string): string | null {
    // German receipts: "Sie haben 12,50 EUR an Coffee Shop gesendet"
    const match = text.match(/Sie haben ([\d,.]+) ([A-Z]{3}) (?:an |to )([^.]+?) gesendet/);
    if (!match) return null;

    // Rewritten into the same shape Wise uses so the model sees one phrasing
    const [, amount, currency, merchant] = match;
    return `You spent ${amount} ${currency} at ${merchant.trim()}.`;
  }
}
