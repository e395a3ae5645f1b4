import { z } from 'zod';
import { isValid, parse } from 'date-fns';
import { DEFAULT_CATEGORIES, SheetRow, Transaction } from '../types';

export const AMOUNT_PATTERN = /^\d+\.\d{2}$/;
export const CURRENCY_PATTERN = /^[A-Z]{3}$/;
export const DATE_PATTERN = /^\d{2}-\d{2}-\d{4}$/;
// 1-12 with or without a leading zero; 0 and 00 are not 12-hour clock hours
export const TIME_PATTERN = /^(0[1-9]|1[0-2]|[1-9]):[0-5][0-9] [AP]M$/;

export const DEFAULT_ACCOUNTS = ['Wise', 'PayPal'] as const;

export interface ValidatorOptions {
  categories: readonly string[];
  accounts: readonly string[];
}

export type ValidationResult =
  | { ok: true; transaction: Transaction }
  | { ok: false; field: string; value: unknown; reason: string };

export function isCalendarDate(value: string): boolean {
  if (!DATE_PATTERN.test(value)) return false;
  // date-fns rejects 31-02-2023 and friends
  return isValid(parse(value, 'dd-MM-yyyy', new Date()));
}

export function createTransactionSchema({ categories, accounts }: ValidatorOptions) {
  return z.object({
    amount: z.string().regex(AMOUNT_PATTERN, 'expected digits with exactly two decimal places'),
    currency: z.preprocess(
      value => (typeof value === 'string' ? value.toUpperCase() : value),
      z.string().regex(CURRENCY_PATTERN, 'expected a 3-letter currency code')
    ),
    merchant: z.string().refine(value => value.trim().length > 0, 'merchant must not be empty'),
    category: z.string().refine(value => categories.includes(value), `expected one of: ${categories.join(', ')}`),
    date: z.string().refine(isCalendarDate, 'expected a real calendar date in DD-MM-YYYY format'),
    time: z.string().regex(TIME_PATTERN, 'expected h:mm AM/PM with an hour from 1 to 12'),
    account: z.string().refine(value => accounts.includes(value), `expected one of: ${accounts.join(', ')}`),
  });
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Turns a decoded model record into a Transaction, or reports the first field that breaks the schema.
 */
export class TransactionValidator {
  private schema: ReturnType<typeof createTransactionSchema>;

  constructor(options: ValidatorOptions = { categories: DEFAULT_CATEGORIES, accounts: DEFAULT_ACCOUNTS }) {
    this.schema = createTransactionSchema(options);
  }

  validate(input: unknown): ValidationResult {
    if (!isPlainObject(input)) {
      return { ok: false, field: '(record)', value: input, reason: 'expected a JSON object' };
    }

    const parsed = this.schema.safeParse(input);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue && issue.path.length > 0 ? String(issue.path[0]) : '(record)';
      return {
        ok: false,
        field,
        value: field === '(record)' ? input : input[field],
        reason: issue ? issue.message : 'invalid transaction',
      };
    }

    const { amount, currency, merchant, category, date, time, account } = parsed.data;
    const transaction: Transaction = Object.freeze({ amount, currency, merchant, category, date, time, account });
    return { ok: true, transaction };
  }
}

export function describeValidationFailure(result: { field: string; value: unknown; reason: string }): string {
  return `${result.field}: ${result.reason} (got ${JSON.stringify(result.value) ?? 'undefined'})`;
}

export function toSheetRow(t: Transaction): SheetRow {
  return [t.date, t.time, t.merchant, t.amount, t.currency, t.category, t.account];
}
