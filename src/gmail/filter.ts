import { format, subDays } from 'date-fns';
import { MailboxBackend, MessagePage, MessageRef, ProviderParser } from '../types';
import { DEFAULT_RETRY_POLICY, RetryPolicy, retryWithPolicy } from '../utils/errors';

export interface QueryOptions {
  days: number;
  claimLabel?: string;
  now?: Date;
}

/** Gmail writes label names with spaces and slashes as dashes in search queries. */
export function labelQueryName(label: string): string {
  return label.trim().replace(/[\s/]+/g, '-');
}

/**
 * Example: after:2024/01/01 ((from:bank1 "x") OR (from:bank2 "y")) -label:tracked
 */
export function buildGmailQuery(parsers: ProviderParser[], options: QueryOptions): string {
  const afterDate = format(subDays(options.now ?? new Date(), options.days), 'yyyy/MM/dd');

  const searchTerms = parsers.flatMap(p => p.getSearchTerms());
  const combinedTerms = searchTerms.length > 0
    ? `(${searchTerms.map(t => `(${t})`).join(' OR ')})`
    : '';

  const exclusion = options.claimLabel ? `-label:${labelQueryName(options.claimLabel)}` : '';

  return [`after:${afterDate}`, combinedTerms, exclusion].filter(Boolean).join(' ');
}

export interface MessageFilterOptions {
  days: number;
  claimLabel?: string;
  retryPolicy?: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
  // Hard stop against a backend that never stops handing out page tokens
  maxPages?: number;
}

/**
 * Selects every candidate message the providers care about, following page tokens to the end.
 * Read-only. A failure that survives the retry policy propagates and aborts the run.
 */
export class MessageFilter {
  constructor(
    private mailbox: MailboxBackend,
    private parsers: ProviderParser[],
    private options: MessageFilterOptions
  ) {}

  buildQuery(now?: Date): string {
    return buildGmailQuery(this.parsers, { days: this.options.days, claimLabel: this.options.claimLabel, now });
  }

  async findCandidates(now?: Date): Promise<MessageRef[]> {
    const query = this.buildQuery(now);
    const maxPages = this.options.maxPages ?? 1000;
    const seen = new Set<string>();
    const refs: MessageRef[] = [];

    console.log(`Searching for emails with query: ${query}`);

    let pageToken: string | undefined = undefined;
    let pages = 0;
    do {
      const token = pageToken;
      const page: MessagePage = await retryWithPolicy(
        () => this.mailbox.search(query, token),
        this.options.retryPolicy ?? DEFAULT_RETRY_POLICY,
        {
          sleep: this.options.sleep,
          context: { query, pageToken: token },
          onRetry: (error, attempt) => {
            console.warn(`Retrying mailbox search (attempt ${attempt}): ${error.message}`);
          },
        }
      );

      for (const ref of page.messages) {
        if (seen.has(ref.id)) continue;
        seen.add(ref.id);
        refs.push(ref);
      }

      pageToken = page.nextPageToken || undefined;
      pages++;
    } while (pageToken && pages < maxPages);

    if (pageToken) {
      console.warn(`Stopped paging after ${maxPages} pages; remaining messages are left for the next run.`);
    }

    console.log(`Found ${refs.length} messages.`);
    return refs;
  }
}
