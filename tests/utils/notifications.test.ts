import { beforeEach, describe, expect, it, vi } from 'vitest';
import {
  EmailMessage,
  EmailSender,
  buildRunHtmlBody,
  buildRunSubject,
  buildFailureSubject,
  buildFailureTextBody,
  buildRunTextBody,
  sendFailureNotification,
  sendRunNotification,
  sendWarningNotification,
} from '../../src/utils/notifications';
import { BatchResult } from '../../src/types';

function result(overrides: Partial<BatchResult> = {}): BatchResult {
  return {
    transactions: [],
    failures: [{ candidateId: 'm3', stage: 'validate', reason: 'time: bad hour (got "<00:10 AM>")' }],
    counts: {
      found: 4,
      claimed: 4,
      validated: 3,
      failed: { claim: 0, fetch: 0, extract: 0, resolve: 0, validate: 1 },
    },
    interrupted: false,
    startedAt: new Date(2024, 2, 10, 8, 0),
    finishedAt: new Date(2024, 2, 10, 8, 1),
    ...overrides,
  };
}

class RecordingSender implements EmailSender {
  readonly sent: EmailMessage[] = [];
  constructor(private outcome: string | null | Error = 'msg-1') {}

  async sendEmail(options: EmailMessage): Promise<string | null> {
    this.sent.push(options);
    if (this.outcome instanceof Error) throw this.outcome;
    return this.outcome;
  }
}

describe('run notification', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  it('summarises counts in the subject and text body', () => {
    expect(buildRunSubject(result())).toBe('⚠️ Spend Sync Complete - 3 new transactions, 1 skipped');
    expect(buildRunTextBody(result())).toBe('Spend sync completed. Found 4 messages, claimed 4, recorded 3 transactions, skipped 1.');

    const quiet = result({
      failures: [],
      counts: { found: 0, claimed: 0, validated: 0, failed: { claim: 0, fetch: 0, extract: 0, resolve: 0, validate: 0 } },
    });
    expect(buildRunSubject(quiet)).toBe('✅ Spend Sync Complete - 0 new transactions');
    expect(buildRunTextBody(quiet)).toBe('Spend sync completed. No new transactions found.');
  });

  it('lists failures by stage with escaped reasons', () => {
    const html = buildRunHtmlBody(result(), new Date(2024, 2, 10, 8, 1, 5));

    expect(html).toContain('<p style="margin: 0;">2024-03-10 08:01:05</p>');
    expect(html).toContain('<td>Validation</td>\n            <td class="error">1</td>');
    expect(html).toContain('<li><code>m3</code> (validate): time: bad hour (got &quot;&lt;00:10 AM&gt;&quot;)</li>');
    expect(html).not.toContain('<td>Extraction</td>');
  });

  it('sends through the given sender', async () => {
    const sender = new RecordingSender();

    expect(await sendRunNotification(sender, result(), 'me@example.com')).toBe(true);
    expect(sender.sent).toHaveLength(1);
    expect(sender.sent[0]).toMatchObject({ to: 'me@example.com', subject: '⚠️ Spend Sync Complete - 3 new transactions, 1 skipped' });
  });

  it('never throws when sending fails', async () => {
    expect(await sendRunNotification(new RecordingSender(new Error('smtp down')), result(), 'me@example.com')).toBe(false);
    expect(await sendRunNotification(new RecordingSender(null), result(), 'me@example.com')).toBe(false);
  });
});

describe('failure and warning notifications', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  it('names the phase the run failed in', () => {
    expect(buildFailureSubject('search')).toBe('❌ Spend Sync Failed - mailbox search');
    expect(buildFailureTextBody(new Error('token revoked'), 'search', new Date(2024, 2, 10, 8, 1, 5))).toBe(
      'Spend sync failed during mailbox search at 2024-03-10 08:01:05.\n\nError: token revoked'
    );
  });

  it('says where the rows went when the upload failed', () => {
    expect(buildFailureTextBody(new Error('sheet is read-only'), 'upload', new Date(2024, 2, 10, 8, 1, 5))).toBe(
      'Spend sync failed during sheet upload at 2024-03-10 08:01:05.\n\n' +
      'Error: sheet is read-only\n\n' +
      'The rows are held in the ledger and re-sent by the next run.'
    );
  });

  it('sends failures and warnings as plain text', async () => {
    const sender = new RecordingSender();

    expect(await sendFailureNotification(sender, new Error('disk full'), 'output', 'me@example.com')).toBe(true);
    expect(await sendWarningNotification(sender, 'Budget alert: $0.8000 of $1.00 used today (80.0%)', 'me@example.com')).toBe(true);

    expect(sender.sent).toEqual([
      {
        to: 'me@example.com',
        subject: '❌ Spend Sync Failed - local output',
        body: expect.stringContaining('Error: disk full'),
      },
      {
        to: 'me@example.com',
        subject: '⚠️ Spend Tracker Warning',
        body: 'Budget alert: $0.8000 of $1.00 used today (80.0%)',
      },
    ]);
  });

  it('never throws when a failure email cannot be sent', async () => {
    const sender = new RecordingSender(new Error('smtp down'));
    expect(await sendFailureNotification(sender, new Error('x'), 'search', 'me@example.com')).toBe(false);
  });
});
