export const DEFAULT_CATEGORIES = [
  'Transport',
  'Food & Dining',
  'Travel',
  'Home',
  'Utilities',
  'People',
  'Shopping',
  'Grocery',
  'Other',
] as const;

// date, time, merchant, amount, currency, category, account
export type SheetRow = [string, string, string, string, string, string, string];

// Reference returned by a mailbox search page
export interface MessageRef {
  id: string;
  threadId?: string;
}

export interface MessagePage {
  messages: MessageRef[];
  nextPageToken?: string;
}

/**
 * One source message selected by the mailbox query.
 */
export interface Candidate {
  id: string;
  threadId: string;
  subject: string;
  from: string;
  date: Date;
  plainBody: string;
  htmlBody: string;
}

export interface CoarseRecord {
  description: string; // "You spent 45.67 EUR at Coffee Shop."
  date: string; // DD-MM-YYYY hh:mm AM/PM
  account: string;
}

export interface Transaction {
  readonly amount: string;
  readonly currency: string;
  readonly merchant: string;
  readonly category: string;
  readonly date: string; // DD-MM-YYYY
  readonly time: string; // h:mm AM/PM
  readonly account: string;
}

export const STAGES = ['claim', 'fetch', 'extract', 'resolve', 'validate'] as const;

export type Stage = (typeof STAGES)[number];

export interface StageFailure {
  candidateId: string;
  stage: Stage;
  reason: string;
}

export interface RunCounts {
  found: number;
  claimed: number;
  validated: number;
  failed: Record<Stage, number>;
}

export interface BatchResult {
  transactions: Transaction[];
  failures: StageFailure[];
  counts: RunCounts;
  interrupted: boolean;
  startedAt: Date;
  finishedAt: Date;
}

/**
 * A payment provider whose notification emails can be turned into a CoarseRecord.
 */
export interface ProviderParser {
  account: string;
  // Gmail search fragment, e.g. 'from:noreply@wise.com ("You spent" OR "is now in")'
  getSearchTerms(): string[];
  matchesSender(from: string): boolean;
  // Natural-language description, or null when the body holds no transaction
  describe(text: string): string | null;
}

export interface MailboxBackend {
  search(query: string, pageToken?: string): Promise<MessagePage>;
  getMessage(id: string): Promise<Candidate>;
  claim(id: string): Promise<void>;
}

export interface ModelUsage {
  inputTokens?: number;
  outputTokens?: number;
}

export interface ModelResponse {
  text: string;
  usage?: ModelUsage;
}

export interface ModelBackend {
  readonly modelId: string;
  generate(prompt: string): Promise<ModelResponse>;
}

export interface OutputSink {
  append(rows: Transaction[]): Promise<void>;
}

export type BudgetDecision =
  | { action: 'proceed' }
  | { action: 'wait'; retryAfterMs: number }
  | { action: 'deny'; reason: string };

export interface RateBudgetGate {
  beforeCall(estimatedCost: number): BudgetDecision;
}
