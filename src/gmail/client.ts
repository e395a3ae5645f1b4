import { google, gmail_v1 } from 'googleapis';
import { OAuth2Client } from 'google-auth-library';
import { authorize } from './auth';
import { Candidate, MailboxBackend, MessagePage } from '../types';
import { AppError, ErrorType, classifyError } from '../utils/errors';

function decodePart(data: string): string {
  return Buffer.from(data, 'base64').toString('utf-8');
}

function collectBodies(parts: gmail_v1.Schema$MessagePart[]): { plain: string; html: string } {
  let plain = '';
  let html = '';
  for (const part of parts) {
    if (part.mimeType === 'text/plain' && part.body?.data) {
      plain += decodePart(part.body.data);
    } else if (part.mimeType === 'text/html' && part.body?.data) {
      html += decodePart(part.body.data);
    } else if (part.parts) {
      const nested = collectBodies(part.parts);
      plain += nested.plain;
      html += nested.html;
    }
  }
  return { plain, html };
}

/**
 * Map a full-format Gmail message onto a Candidate.
 */
export function toCandidate(message: gmail_v1.Schema$Message): Candidate {
  const payload = message.payload;
  if (!message.id || !payload) {
    throw new AppError({
      type: ErrorType.PARSING_ERROR,
      message: `Gmail returned a message without ${message.id ? 'payload' : 'id'}`,
      retryable: false,
      context: { messageId: message.id },
    });
  }

  const headers = payload.headers || [];
  const header = (name: string) =>
    headers.find(h => h.name?.toLowerCase() === name.toLowerCase())?.value || '';

  let plainBody = '';
  let htmlBody = '';

  if (payload.body?.data) {
    if (payload.mimeType === 'text/html') {
      htmlBody = decodePart(payload.body.data);
    } else {
      plainBody = decodePart(payload.body.data);
    }
  } else if (payload.parts) {
    const { plain, html } = collectBodies(payload.parts);
    plainBody = plain;
    htmlBody = html;
  }

  return {
    id: message.id,
    threadId: message.threadId || '',
    subject: header('Subject'),
    from: header('From'),
    date: new Date(header('Date')),
    plainBody,
    htmlBody,
  };
}

export class GmailClient implements MailboxBackend {
  private gmail: gmail_v1.Gmail | null = null;
  private claimLabelId: string | null = null;

  constructor(private claimLabel: string, private authProvider: () => Promise<OAuth2Client> = authorize) {}

  async init() {
    const auth = await this.authProvider();
    this.gmail = google.gmail({ version: 'v1', auth });
  }

  private async api(): Promise<gmail_v1.Gmail> {
    if (!this.gmail) await this.init();
    if (!this.gmail) {
      throw new AppError({ type: ErrorType.AUTHENTICATION_ERROR, message: 'Gmail client is not initialised', retryable: false });
    }
    return this.gmail;
  }

  async search(query: string, pageToken?: string): Promise<MessagePage> {
    const gmail = await this.api();
    const res = await gmail.users.messages.list({
      userId: 'me',
      q: query,
      pageToken,
      maxResults: 500,
    });

    const messages = (res.data.messages || []).flatMap(m =>
      m.id ? [{ id: m.id, threadId: m.threadId || undefined }] : []
    );
    return { messages, nextPageToken: res.data.nextPageToken || undefined };
  }

  async getMessage(id: string): Promise<Candidate> {
    const gmail = await this.api();
    const res = await gmail.users.messages.get({
      userId: 'me',
      id,
      format: 'full',
    });
    return toCandidate(res.data);
  }

  /**
   * Adds the claim label. Re-labelling an already labelled message is a no-op on Gmail's side.
   */
  async claim(id: string): Promise<void> {
    const gmail = await this.api();
    const labelId = await this.ensureClaimLabel(gmail);
    await gmail.users.messages.modify({
      userId: 'me',
      id,
      requestBody: { addLabelIds: [labelId] },
    });
  }

  private async ensureClaimLabel(gmail: gmail_v1.Gmail): Promise<string> {
    if (this.claimLabelId) return this.claimLabelId;

    // Gmail treats label names case-insensitively; creating a differently cased twin is a 409
    const wanted = this.claimLabel.toLowerCase();
    const existing = await gmail.users.labels.list({ userId: 'me' });
    const found = (existing.data.labels || []).find(l => l.name?.toLowerCase() === wanted);
    if (found?.id) {
      this.claimLabelId = found.id;
      return found.id;
    }

    try {
      const created = await gmail.users.labels.create({
        userId: 'me',
        requestBody: {
          name: this.claimLabel,
          labelListVisibility: 'labelShow',
          messageListVisibility: 'show',
        },
      });
      if (!created.data.id) {
        throw new Error(`Gmail did not return an id for label "${this.claimLabel}"`);
      }
      console.log(`Created Gmail label "${this.claimLabel}"`);
      this.claimLabelId = created.data.id;
      return created.data.id;
    } catch (error: unknown) {
      throw classifyError(error, { label: this.claimLabel });
    }
  }

  /**
   * Encode email subject for RFC 2047 (handles UTF-8 characters like emojis)
   */
  private encodeSubject(subject: string): string {
    const hasNonASCII = /[^\x00-\x7F]/.test(subject);

    if (!hasNonASCII) {
      return subject;
    }

    // Format: =?UTF-8?B?<base64>?=
    const encoded = Buffer.from(subject, 'utf-8')
      .toString('base64')
      .replace(/\n/g, '');

    // Split into chunks of 75 characters (RFC 2047 limit per line)
    const chunks: string[] = [];
    for (let i = 0; i < encoded.length; i += 75) {
      chunks.push(encoded.substring(i, i + 75));
    }

    return chunks.map(chunk => `=?UTF-8?B?${chunk}?=`).join('\r\n ');
  }

  /**
   * Send an email using Gmail API
   */
  async sendEmail(options: {
    to: string;
    subject: string;
    body: string;
    htmlBody?: string;
  }): Promise<string | null> {
    const gmail = await this.api();

    const messageParts = [
      `To: ${options.to}`,
      `Subject: ${this.encodeSubject(options.subject)}`,
      'MIME-Version: 1.0',
      `Content-Type: ${options.htmlBody ? 'text/html' : 'text/plain'}; charset=utf-8`,
      '',
      options.htmlBody || options.body,
    ];

    // base64url (RFC 4648) as required by Gmail API
    const encodedMessage = Buffer.from(messageParts.join('\r\n'))
      .toString('base64')
      .replace(/\+/g, '-')
      .replace(/\//g, '_')
      .replace(/=+$/, '');

    const res = await gmail.users.messages.send({
      userId: 'me',
      requestBody: {
        raw: encodedMessage,
      },
    });

    return res.data.id || null;
  }
}
