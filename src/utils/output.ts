import fs from 'fs-extra';
import { SheetRow, Transaction } from '../types';
import { toSheetRow } from '../validation/transaction';

/**
 * Write the run's rows as a JSON array, in sheet column order. Overwrites the previous run's file.
 */
export async function writeOutputFile(filePath: string, transactions: Transaction[]): Promise<SheetRow[]> {
  const rows = transactions.map(toSheetRow);
  await fs.outputJson(filePath, rows, { spaces: 2 });
  console.log(`Wrote ${rows.length} rows to ${filePath}`);
  return rows;
}
