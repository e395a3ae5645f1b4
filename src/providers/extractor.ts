import * as cheerio from 'cheerio';
import { format, isValid } from 'date-fns';
import { Candidate, CoarseRecord } from '../types';
import { ProviderRegistry } from './registry';

export type ExtractionFailureReason = 'unknown-sender' | 'empty-body' | 'no-transaction-details' | 'invalid-timestamp';

export type ExtractionResult =
  | { ok: true; record: CoarseRecord }
  | { ok: false; reason: ExtractionFailureReason; message: string };

// hh is 01-12, so midnight renders as 12:xx AM and 13:xx as 01:xx PM
export const COMPOSITE_TIMESTAMP_FORMAT = 'dd-MM-yyyy hh:mm a';

export function formatCompositeTimestamp(date: Date): string {
  return format(date, COMPOSITE_TIMESTAMP_FORMAT);
}

/**
 * Visible text of an HTML body, whitespace-collapsed.
 */
export function htmlToText(html: string): string {
  // A space before every tag keeps adjacent cells from gluing together
  const $ = cheerio.load(html.replace(/</g, ' <'));
  $('head, title, style, script').remove();
  return $.root().text().replace(/\s+/g, ' ').trim();
}

export class FieldExtractor {
  constructor(private registry: ProviderRegistry) {}

  extract(candidate: Candidate): ExtractionResult {
    const provider = this.registry.findBySender(candidate.from);
    if (!provider) {
      return { ok: false, reason: 'unknown-sender', message: `No provider for sender: ${candidate.from}` };
    }

    const text = candidate.htmlBody
      ? htmlToText(candidate.htmlBody)
      : candidate.plainBody.replace(/\s+/g, ' ').trim();

    if (!text) {
      return { ok: false, reason: 'empty-body', message: 'Message has no readable body' };
    }

    const description = provider.describe(text);
    if (!description) {
      return { ok: false, reason: 'no-transaction-details', message: 'No transaction details found' };
    }

    if (!isValid(candidate.date)) {
      return { ok: false, reason: 'invalid-timestamp', message: 'Message has no usable Date header' };
    }

    return {
      ok: true,
      record: {
        description,
        date: formatCompositeTimestamp(candidate.date),
        account: provider.account,
      },
    };
  }
}
