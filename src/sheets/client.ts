import { google, sheets_v4 } from 'googleapis';
import { OAuth2Client } from 'google-auth-library';
import { OutputSink, SheetRow, Transaction } from '../types';
import { toSheetRow } from '../validation/transaction';
import { DEFAULT_RETRY_POLICY, RetryPolicy, classifyError, formatError, retryWithPolicy } from '../utils/errors';

export interface SheetsConfig {
  spreadsheetId: string;
  range: string; // e.g. 'Sheet1!A2:G'
}

/**
 * Appends validated transactions as rows: date, time, merchant, amount, currency, category, account.
 */
export class SheetsSink implements OutputSink {
  private values: sheets_v4.Resource$Spreadsheets$Values | null = null;

  constructor(
    private config: SheetsConfig,
    private authProvider: () => Promise<OAuth2Client>,
    private retryPolicy: RetryPolicy = DEFAULT_RETRY_POLICY
  ) {}

  private async api(): Promise<sheets_v4.Resource$Spreadsheets$Values> {
    if (!this.values) {
      const auth = await this.authProvider();
      this.values = google.sheets({ version: 'v4', auth }).spreadsheets.values;
    }
    return this.values;
  }

  async append(transactions: Transaction[]): Promise<void> {
    if (transactions.length === 0) return;

    const rows: SheetRow[] = transactions.map(toSheetRow);
    const values = await this.api();

    try {
      const res = await retryWithPolicy(
        () => values.append({
          spreadsheetId: this.config.spreadsheetId,
          range: this.config.range,
          valueInputOption: 'USER_ENTERED',
          requestBody: { values: rows },
        }),
        this.retryPolicy,
        {
          onRetry: (error, attempt) => {
            console.warn(`Retrying sheet append of ${rows.length} rows (attempt ${attempt}): ${error.message}`);
          },
        }
      );

      const updatedCells = res.data.updates?.updatedCells ?? 0;
      console.log(`${updatedCells} cells appended to Google Sheet`);
    } catch (error: unknown) {
      const appError = classifyError(error, { spreadsheetId: this.config.spreadsheetId, rows: rows.length });
      console.error('Failed to append rows to sheet:', formatError(appError));
      throw appError;
    }
  }
}
