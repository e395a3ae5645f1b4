import { describe, expect, it } from 'vitest';
import { FieldExtractor, formatCompositeTimestamp, htmlToText } from '../../src/providers/extractor';
import { ProviderRegistry } from '../../src/providers/registry';
import { otherEmail, paypalEmail, wiseEmail } from '../helpers/fixtures';

const extractor = new FieldExtractor(new ProviderRegistry());

describe('formatCompositeTimestamp', () => {
  it('uses a 12-hour clock', () => {
    expect(formatCompositeTimestamp(new Date(2024, 2, 5, 14, 7))).toBe('05-03-2024 02:07 PM');
  });

  it('renders midnight as 12 AM', () => {
    expect(formatCompositeTimestamp(new Date(2024, 2, 5, 0, 10))).toBe('05-03-2024 12:10 AM');
  });
});

describe('htmlToText', () => {
  it('drops head content and separates cells', () => {
    const html = '<html><head><title>T</title><style>p{}</style></head><body><td>One</td><td>Two</td><script>x()</script></body></html>';
    expect(htmlToText(html)).toBe('One Two');
  });
});

describe('FieldExtractor', () => {
  it('builds a coarse record from a Wise HTML body', () => {
    const result = extractor.extract(wiseEmail('m1', '45.67', 'EUR', 'Coffee Shop', new Date(2024, 2, 5, 9, 30)));
    expect(result).toEqual({
      ok: true,
      record: { description: 'You spent 45.67 EUR at Coffee Shop.', date: '05-03-2024 09:30 AM', account: 'Wise' },
    });
  });

  it('reads the plain body when there is no HTML', () => {
    const result = extractor.extract(paypalEmail('m2', '12,50', 'EUR', 'Corner Bakery', new Date(2024, 2, 6, 18, 0)));
    expect(result).toEqual({
      ok: true,
      record: { description: 'You spent 12,50 EUR at Corner Bakery.', date: '06-03-2024 06:00 PM', account: 'PayPal' },
    });
  });

  it('rejects unknown senders', () => {
    const result = extractor.extract(otherEmail('m3', 'news@example.com', 'You spent 1.00 EUR at X.', new Date()));
    expect(result).toEqual({ ok: false, reason: 'unknown-sender', message: 'No provider for sender: news@example.com' });
  });

  it('rejects empty bodies', () => {
    const result = extractor.extract(otherEmail('m4', 'noreply@wise.com', '   ', new Date()));
    expect(result).toMatchObject({ ok: false, reason: 'empty-body' });
  });

  it('rejects bodies without a payment sentence', () => {
    const result = extractor.extract(otherEmail('m5', 'noreply@wise.com', '100 USD is now in your account.', new Date()));
    expect(result).toEqual({ ok: false, reason: 'no-transaction-details', message: 'No transaction details found' });
  });

  it('rejects a message without a usable date', () => {
    const result = extractor.extract(otherEmail('m6', 'noreply@wise.com', 'You spent 1.00 EUR at Kiosk.', new Date('not a date')));
    expect(result).toMatchObject({ ok: false, reason: 'invalid-timestamp' });
  });
});
