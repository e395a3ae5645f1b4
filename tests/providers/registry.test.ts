import { describe, expect, it } from 'vitest';
import { ProviderRegistry, createProviderRegistry } from '../../src/providers/registry';
import { WiseParser } from '../../src/providers/wise';
import { PayPalParser } from '../../src/providers/paypal';

describe('WiseParser', () => {
  const parser = new WiseParser();

  it('matches Wise senders only', () => {
    expect(parser.matchesSender('Wise <noreply@wise.com>')).toBe(true);
    expect(parser.matchesSender('service@paypal.de')).toBe(false);
  });

  it('describes a card payment up to the first period', () => {
    expect(parser.describe('Hi, You spent 45.67 EUR at Coffee Shop. Balance updated')).toBe('You spent 45.67 EUR at Coffee Shop.');
  });

  it('returns null for mail without a payment', () => {
    expect(parser.describe('Your USD balance is now in your account')).toBeNull();
  });
});

describe('PayPalParser', () => {
  const parser = new PayPalParser();

  it('rewrites German receipts into the common phrasing', () => {
    expect(parser.describe('Sie haben 12,50 EUR an Corner Bakery gesendet')).toBe('You spent 12,50 EUR at Corner Bakery.');
    expect(parser.describe('Sie haben 3,00 EUR to Bike Rental gesendet')).toBe('You spent 3,00 EUR at Bike Rental.');
  });

  it('returns null when the sentence is missing', () => {
    expect(parser.describe('Ihre Zahlung wurde storniert')).toBeNull();
  });
});

describe('ProviderRegistry', () => {
  it('picks the provider by sender', () => {
    const registry = new ProviderRegistry();
    expect(registry.findBySender('service@paypal.de')?.account).toBe('PayPal');
    expect(registry.findBySender('someone@example.com')).toBeUndefined();
    expect(registry.getAccounts()).toEqual(['Wise', 'PayPal']);
  });

  it('limits the registry to named providers, case-insensitively', () => {
    const { registry, unknown } = createProviderRegistry(['paypal', 'Revolut', '']);
    expect(registry.getAccounts()).toEqual(['PayPal']);
    expect(unknown).toEqual(['Revolut']);
  });

  it('enables every provider when none are named', () => {
    expect(createProviderRegistry().registry.getAccounts()).toEqual(['Wise', 'PayPal']);
  });
});
