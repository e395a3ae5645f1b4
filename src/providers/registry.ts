import { ProviderParser } from '../types';
import { WiseParser } from './wise';
import { PayPalParser } from './paypal';

export class ProviderRegistry {
  private parsers: ProviderParser[] = [];

  constructor(parsers: ProviderParser[] = [new WiseParser(), new PayPalParser()]) {
    parsers.forEach(p => this.register(p));
  }

  register(parser: ProviderParser) {
    this.parsers.push(parser);
  }

  // Account is decided by sender alone, never by body content
  findBySender(from: string): ProviderParser | undefined {
    return this.parsers.find(p => p.matchesSender(from));
  }

  getAllParsers(): ProviderParser[] {
    return this.parsers;
  }

  getAccounts(): string[] {
    return this.parsers.map(p => p.account);
  }
}

/**
 * Registry limited to the named accounts (case-insensitive). Unknown names are returned separately.
 */
export function createProviderRegistry(accounts?: string[]): { registry: ProviderRegistry; unknown: string[] } {
  const available: ProviderParser[] = [new WiseParser(), new PayPalParser()];
  if (!accounts || accounts.length === 0) {
    return { registry: new ProviderRegistry(available), unknown: [] };
  }

  const wanted = accounts.map(a => a.trim().toLowerCase()).filter(Boolean);
  const selected = available.filter(p => wanted.includes(p.account.toLowerCase()));
  const known = available.map(p => p.account.toLowerCase());
  const unknown = accounts.filter(a => a.trim() && !known.includes(a.trim().toLowerCase()));

  return { registry: new ProviderRegistry(selected), unknown };
}
