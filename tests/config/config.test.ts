import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { createRulesTemplate, loadConfig, loadRules } from '../../src/config';
import { DEFAULT_CATEGORY_HINTS, RulesEngine } from '../../src/rules/engine';
import { DEFAULT_CATEGORIES } from '../../src/types';
import { AppError, ErrorType } from '../../src/utils/errors';

function configError(fn: () => unknown): AppError {
  try {
    fn();
  } catch (error: unknown) {
    if (error instanceof AppError) return error;
    throw error;
  }
  throw new Error('expected a configuration error');
}

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'spend-config-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    fs.removeSync(dir);
    vi.restoreAllMocks();
  });

  it('fills in defaults', () => {
    const config = loadConfig({ GOOGLE_API_KEY: 'test-secret' }, { cwd: dir });

    expect(config.recencyDays).toBe(7);
    expect(config.claimLabel).toBe('AutoSpendTracker/Processed');
    expect(config.model).toEqual({
      name: 'gemini-2.5-flash',
      temperature: 0.1,
      apiKey: 'test-secret',
      project: undefined,
      location: 'us-central1',
      pricing: { inputPerMillion: 0.075, outputPerMillion: 0.3 },
    });
    expect(config.categories).toEqual([...DEFAULT_CATEGORIES]);
    expect(config.accounts).toEqual(['Wise', 'PayPal']);
    expect(config.categoryHints).toEqual(DEFAULT_CATEGORY_HINTS);
    expect(config.rateLimit).toEqual({ maxCalls: 60, periodMs: 60_000, dailyBudget: undefined, alertThreshold: 0.8 });
    expect(config.sheets).toEqual({ spreadsheetId: undefined, range: 'Sheet1!A2:G' });
    expect(config.paths.db).toBe(path.join(dir, 'data', 'spend_tracker.db'));
    expect(config.paths.output).toBe(path.join(dir, 'transaction_data.json'));
    expect(config.showUsageSummary).toBe(false);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig(
      {
        PROJECT_ID: 'test-project',
        EMAIL_DAYS_BACK: '3',
        PROVIDERS: 'paypal',
        API_RATE_LIMIT_CALLS: '10',
        API_RATE_LIMIT_PERIOD: '30',
        DAILY_BUDGET_USD: '2.5',
        SHOW_USAGE_SUMMARY: 'true',
        SPREADSHEET_ID: 'sheet-1',
        GOOGLE_API_KEY: '',
      },
      { cwd: dir, requireSheets: true }
    );

    expect(config.recencyDays).toBe(3);
    expect(config.accounts).toEqual(['PayPal']);
    expect(config.model.apiKey).toBeUndefined();
    expect(config.model.project).toBe('test-project');
    expect(config.rateLimit).toMatchObject({ maxCalls: 10, periodMs: 30_000, dailyBudget: 2.5 });
    expect(config.sheets.spreadsheetId).toBe('sheet-1');
    expect(config.showUsageSummary).toBe(true);
  });

  it('requires a way to reach the model', () => {
    const error = configError(() => loadConfig({}, { cwd: dir }));
    expect(error.type).toBe(ErrorType.CONFIGURATION_ERROR);
    expect(error.message).toBe('Either GOOGLE_API_KEY or PROJECT_ID must be set to reach the model');

    expect(loadConfig({}, { cwd: dir, requireModel: false }).accounts).toEqual(['Wise', 'PayPal']);
  });

  it('requires a spreadsheet when uploading', () => {
    const error = configError(() => loadConfig({ GOOGLE_API_KEY: 'test-secret' }, { cwd: dir, requireSheets: true }));
    expect(error.message.startsWith('SPREADSHEET_ID is required')).toBe(true);
  });

  it('rejects unknown providers', () => {
    const error = configError(() => loadConfig({ GOOGLE_API_KEY: 'test-secret', PROVIDERS: 'Wise,Revolut' }, { cwd: dir }));
    expect(error.message).toBe('Unknown providers: Revolut');
  });

  it('rejects malformed values', () => {
    const error = configError(() => loadConfig({ GOOGLE_API_KEY: 'test-secret', EMAIL_DAYS_BACK: '0' }, { cwd: dir }));
    expect(error.message).toBe('Environment validation failed: EMAIL_DAYS_BACK: EMAIL_DAYS_BACK must be at least 1');
  });

  it('keeps only default hints for enabled categories', () => {
    const config = loadConfig({ GOOGLE_API_KEY: 'test-secret', CATEGORIES: 'Grocery, Other' }, { cwd: dir });
    expect(config.categories).toEqual(['Grocery', 'Other']);
    expect(config.categoryHints).toEqual([{ match: 'City Market', category: 'Grocery' }]);
  });

  it('appends rules file hints after the defaults so they win ties', () => {
    fs.writeJsonSync(path.join(dir, 'rules.json'), { category_hints: [{ match: 'Balam', category: 'Shopping' }] });

    const config = loadConfig({ GOOGLE_API_KEY: 'test-secret' }, { cwd: dir });

    expect(config.categoryHints.at(-1)).toEqual({ match: 'Balam', category: 'Shopping' });
    expect(new RulesEngine([...config.categoryHints]).categoryFor('Balam')).toBe('Shopping');
  });

  it('rejects rules with categories outside the list', () => {
    fs.writeJsonSync(path.join(dir, 'rules.json'), { category_hints: [{ match: 'Arcade', category: 'Fun' }] });

    const error = configError(() => loadConfig({ GOOGLE_API_KEY: 'test-secret' }, { cwd: dir }));
    expect(error.message).toBe(`Rules file ${path.join(dir, 'rules.json')} uses unknown categories: Arcade -> Fun`);
  });

  it('rejects a malformed rules file', () => {
    const rulesPath = path.join(dir, 'rules.json');
    fs.writeJsonSync(rulesPath, { category_hints: [{ match: '', category: 'Other' }] });

    expect(configError(() => loadRules(rulesPath, DEFAULT_CATEGORIES)).message.startsWith(`Invalid rules file ${rulesPath}: category_hints.0.match:`)).toBe(true);
  });

  it('writes a rules template once, and the template loads', () => {
    const rulesPath = path.join(dir, 'rules.json');

    expect(createRulesTemplate(rulesPath)).toBe(true);
    expect(createRulesTemplate(rulesPath)).toBe(false);
    expect(loadRules(rulesPath, DEFAULT_CATEGORIES)).toEqual([
      { match: 'Corner Bakery', category: 'Food & Dining' },
      { match: 'Metro Card', category: 'Transport' },
    ]);
  });
});
