import { format } from 'date-fns';
import { BatchResult, STAGES, Stage } from '../types';
import { formatError } from './errors';

export interface EmailMessage {
  to: string;
  subject: string;
  body: string;
  htmlBody?: string;
}

// GmailClient satisfies this
export interface EmailSender {
  sendEmail(options: EmailMessage): Promise<string | null>;
}

const STAGE_LABELS: Record<Stage, string> = {
  claim: 'Claim',
  fetch: 'Fetch',
  extract: 'Extraction',
  resolve: 'Model resolution',
  validate: 'Validation',
};

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

export function totalFailed(result: BatchResult): number {
  return Object.values(result.counts.failed).reduce((sum, n) => sum + n, 0);
}

export function buildRunSubject(result: BatchResult): string {
  const failed = totalFailed(result);
  const icon = failed > 0 ? '⚠️' : '✅';
  return `${icon} Spend Sync Complete - ${result.counts.validated} new transactions${failed > 0 ? `, ${failed} skipped` : ''}`;
}

export function buildRunTextBody(result: BatchResult): string {
  const { found, claimed, validated } = result.counts;
  const failed = totalFailed(result);
  if (found === 0) {
    return 'Spend sync completed. No new transactions found.';
  }
  return `Spend sync completed. Found ${found} messages, claimed ${claimed}, recorded ${validated} transactions, skipped ${failed}.`;
}

export function buildRunHtmlBody(result: BatchResult, sentAt: Date = new Date()): string {
  const date = format(sentAt, 'yyyy-MM-dd HH:mm:ss');
  const failed = totalFailed(result);
  const stageRows = STAGES
    .filter(stage => result.counts.failed[stage] > 0)
    .map(stage => `
          <tr>
            <td>${STAGE_LABELS[stage]}</td>
            <td class="error">${result.counts.failed[stage]}</td>
          </tr>`)
    .join('');

  return `
<!DOCTYPE html>
<html>
<head>
  <style>
    body { font-family: Arial, sans-serif; line-height: 1.6; color: #333; }
    .container { max-width: 600px; margin: 0 auto; padding: 20px; }
    .header { background-color: ${failed > 0 ? '#FF9800' : '#4CAF50'}; color: white; padding: 15px; border-radius: 5px 5px 0 0; }
    .content { background-color: #f9f9f9; padding: 20px; border: 1px solid #ddd; }
    .summary { background-color: white; padding: 15px; margin: 10px 0; border-radius: 5px; }
    .success { color: #4CAF50; font-weight: bold; }
    .error { color: #f44336; font-weight: bold; }
    .info { color: #2196F3; }
    .footer { text-align: center; margin-top: 20px; color: #666; font-size: 12px; }
    table { width: 100%; border-collapse: collapse; margin: 10px 0; }
    th, td { padding: 8px; text-align: left; border-bottom: 1px solid #ddd; }
    th { background-color: #f2f2f2; }
  </style>
</head>
<body>
  <div class="container">
    <div class="header">
      <h2>Spend Sync Complete</h2>
      <p style="margin: 0;">${date}</p>
    </div>
    <div class="content">
      <div class="summary">
        <h3>Run Summary</h3>
        <table>
          <tr>
            <th>Metric</th>
            <th>Count</th>
          </tr>
          <tr>
            <td>Messages Found</td>
            <td class="info">${result.counts.found}</td>
          </tr>
          <tr>
            <td>Messages Claimed</td>
            <td class="info">${result.counts.claimed}</td>
          </tr>
          <tr>
            <td>Transactions Recorded</td>
            <td class="success">${result.counts.validated}</td>
          </tr>
        </table>
      </div>
      ${failed > 0 ? `
      <div class="summary">
        <h3>Skipped by Stage</h3>
        <table>
          <tr>
            <th>Stage</th>
            <th>Count</th>
          </tr>${stageRows}
        </table>
        <ul>
          ${result.failures.map(f => `<li><code>${escapeHtml(f.candidateId)}</code> (${f.stage}): ${escapeHtml(f.reason)}</li>`).join('\n          ')}
        </ul>
      </div>
      ` : ''}
      ${result.interrupted ? `
      <div class="summary" style="border-left: 4px solid #f44336;">
        <p><strong>The run was interrupted.</strong> Unprocessed messages will be picked up next run.</p>
      </div>
      ` : ''}
      ${result.counts.found === 0 ? `
      <p class="success">No new transactions found. Everything is up to date!</p>
      ` : ''}
    </div>
    <div class="footer">
      <p>This is an automated notification from your spend tracker.</p>
    </div>
  </div>
</body>
</html>
  `.trim();
}

// Where a sync run was when it failed
export type SyncPhase = 'search' | 'output' | 'upload';

const PHASE_LABELS: Record<SyncPhase, string> = {
  search: 'mailbox search',
  output: 'local output',
  upload: 'sheet upload',
};

export function buildFailureSubject(phase: SyncPhase): string {
  return `❌ Spend Sync Failed - ${PHASE_LABELS[phase]}`;
}

export function buildFailureTextBody(error: unknown, phase: SyncPhase, sentAt: Date = new Date()): string {
  const lines = [
    `Spend sync failed during ${PHASE_LABELS[phase]} at ${format(sentAt, 'yyyy-MM-dd HH:mm:ss')}.`,
    '',
    `Error: ${formatError(error)}`,
  ];
  if (phase === 'upload') {
    lines.push('', 'The rows are held in the ledger and re-sent by the next run.');
  }
  return lines.join('\n');
}

async function deliver(sender: EmailSender, message: EmailMessage, kind: string): Promise<boolean> {
  try {
    const messageId = await sender.sendEmail(message);
    if (messageId) {
      console.log(`\n📧 ${kind} email sent to ${message.to}`);
      return true;
    }
    console.warn(`\n⚠️  Failed to send ${kind.toLowerCase()} email to ${message.to}`);
    return false;
  } catch (error: unknown) {
    console.warn(`\n⚠️  Failed to send ${kind.toLowerCase()} email: ${formatError(error)}`);
    return false;
  }
}

/**
 * Email the run summary. Never throws; a failed notification is only logged.
 */
export async function sendRunNotification(
  sender: EmailSender,
  result: BatchResult,
  recipientEmail: string
): Promise<boolean> {
  return deliver(sender, {
    to: recipientEmail,
    subject: buildRunSubject(result),
    body: buildRunTextBody(result),
    htmlBody: buildRunHtmlBody(result),
  }, 'Run notification');
}

export async function sendFailureNotification(
  sender: EmailSender,
  error: unknown,
  phase: SyncPhase,
  recipientEmail: string
): Promise<boolean> {
  return deliver(sender, {
    to: recipientEmail,
    subject: buildFailureSubject(phase),
    body: buildFailureTextBody(error, phase),
  }, 'Failure notification');
}

export async function sendWarningNotification(
  sender: EmailSender,
  warning: string,
  recipientEmail: string
): Promise<boolean> {
  return deliver(sender, {
    to: recipientEmail,
    subject: '⚠️ Spend Tracker Warning',
    body: warning,
  }, 'Warning');
}
