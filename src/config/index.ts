import fs from 'fs-extra';
import path from 'path';
import { z, ZodError } from 'zod';
import { DEFAULT_CATEGORIES } from '../types';
import { CategoryHint, DEFAULT_CATEGORY_HINTS, RulesConfig } from '../rules/engine';
import { ModelPricing } from '../ai/usage';
import { createProviderRegistry, ProviderRegistry } from '../providers/registry';
import { configurationError } from '../utils/errors';

const optionalString = z.preprocess(
  value => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().optional()
);

const flag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform(value => value === 'true' || value === '1');

const listOf = (fallback: readonly string[]) =>
  z
    .string()
    .optional()
    .transform(value =>
      value
        ? value.split(',').map(v => v.trim()).filter(v => v.length > 0)
        : [...fallback]
    );

const envSchema = z.object({
  EMAIL_DAYS_BACK: z.coerce.number().int().min(1, { message: 'EMAIL_DAYS_BACK must be at least 1' }).default(7),
  GMAIL_LABEL_NAME: z.string().min(1).default('AutoSpendTracker/Processed'),
  PROVIDERS: listOf(['Wise', 'PayPal']),
  CATEGORIES: listOf(DEFAULT_CATEGORIES),

  // Gemini, either an API key or a Vertex AI project
  GOOGLE_API_KEY: optionalString,
  PROJECT_ID: optionalString,
  LOCATION: z.string().default('us-central1'),
  MODEL_NAME: z.string().default('gemini-2.5-flash'),
  MODEL_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
  MODEL_INPUT_PRICE_PER_MILLION: z.coerce.number().min(0).default(0.075),
  MODEL_OUTPUT_PRICE_PER_MILLION: z.coerce.number().min(0).default(0.3),

  // Google Sheets
  SPREADSHEET_ID: optionalString,
  SHEET_RANGE: z.string().default('Sheet1!A2:G'),

  // Rate limiting and budget
  API_RATE_LIMIT_CALLS: z.coerce.number().int().min(1).default(60),
  API_RATE_LIMIT_PERIOD: z.coerce.number().int().min(1).default(60), // seconds
  DAILY_BUDGET_USD: z.preprocess(
    value => (value === '' ? undefined : value),
    z.coerce.number().positive().optional()
  ),
  BUDGET_ALERT_THRESHOLD: z.coerce.number().gt(0).max(1).default(0.8),

  // Files
  DB_PATH: z.string().default('data/spend_tracker.db'),
  OUTPUT_FILE: z.string().default('transaction_data.json'),
  RULES_FILE: z.string().default('rules.json'),
  CREDENTIALS_PATH: z.string().default('credentials.json'),
  TOKEN_PATH: z.string().default('token.json'),

  NOTIFICATION_EMAIL: optionalString,
  SHOW_USAGE_SUMMARY: flag,
});

export type Env = z.infer<typeof envSchema>;

const rulesSchema = z.object({
  category_hints: z
    .array(
      z.object({
        match: z.string().trim().min(1),
        category: z.string().min(1),
      })
    )
    .default([]),
});

export interface AppConfig {
  readonly recencyDays: number;
  readonly claimLabel: string;
  readonly model: {
    readonly name: string;
    readonly temperature: number;
    readonly apiKey?: string;
    readonly project?: string;
    readonly location: string;
    readonly pricing: ModelPricing;
  };
  readonly categories: readonly string[];
  readonly providers: ProviderRegistry;
  readonly accounts: readonly string[];
  readonly categoryHints: readonly CategoryHint[];
  readonly rateLimit: {
    readonly maxCalls: number;
    readonly periodMs: number;
    readonly dailyBudget?: number;
    readonly alertThreshold: number;
  };
  readonly sheets: {
    readonly spreadsheetId?: string;
    readonly range: string;
  };
  readonly paths: {
    readonly db: string;
    readonly output: string;
    readonly rules: string;
    readonly credentials: string;
    readonly token: string;
  };
  readonly notificationEmail?: string;
  readonly showUsageSummary: boolean;
}

export interface LoadConfigOptions {
  // SPREADSHEET_ID becomes mandatory
  requireSheets?: boolean;
  // GOOGLE_API_KEY or PROJECT_ID is mandatory unless this is false
  requireModel?: boolean;
  cwd?: string;
}

function parseEnv(env: NodeJS.ProcessEnv): Env {
  try {
    return envSchema.parse(env);
  } catch (error: unknown) {
    if (error instanceof ZodError) {
      const issues = error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw configurationError(`Environment validation failed: ${issues.join('; ')}`, { issues });
    }
    throw error;
  }
}

/**
 * Read category hints from a rules file. A missing file means no extra hints.
 */
export function loadRules(rulesPath: string, categories: readonly string[]): CategoryHint[] {
  if (!fs.existsSync(rulesPath)) {
    return [];
  }

  let raw: unknown;
  try {
    raw = fs.readJsonSync(rulesPath);
  } catch (error: unknown) {
    throw configurationError(`Could not read rules file ${rulesPath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  const parsed = rulesSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw configurationError(`Invalid rules file ${rulesPath}: ${issue.path.join('.')}: ${issue.message}`);
  }

  const unknownCategories = parsed.data.category_hints.filter(h => !categories.includes(h.category));
  if (unknownCategories.length > 0) {
    throw configurationError(
      `Rules file ${rulesPath} uses unknown categories: ${unknownCategories.map(h => `${h.match} -> ${h.category}`).join(', ')}`,
      { categories: [...categories] }
    );
  }

  return parsed.data.category_hints;
}

/**
 * Build the immutable configuration for one process from environment variables and rules.json.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, options: LoadConfigOptions = {}): AppConfig {
  const cwd = options.cwd ?? process.cwd();
  const values = parseEnv(env);

  if (options.requireModel !== false && !values.GOOGLE_API_KEY && !values.PROJECT_ID) {
    throw configurationError('Either GOOGLE_API_KEY or PROJECT_ID must be set to reach the model');
  }
  if (options.requireSheets && !values.SPREADSHEET_ID) {
    throw configurationError('SPREADSHEET_ID is required to upload transactions (use --no-sheets to skip the upload)');
  }
  if (values.CATEGORIES.length === 0) {
    throw configurationError('CATEGORIES must name at least one category');
  }

  const { registry, unknown } = createProviderRegistry(values.PROVIDERS);
  if (unknown.length > 0) {
    throw configurationError(`Unknown providers: ${unknown.join(', ')}`, { known: ['Wise', 'PayPal'] });
  }
  if (registry.getAllParsers().length === 0) {
    throw configurationError('PROVIDERS must enable at least one provider');
  }

  const resolvePath = (p: string) => path.resolve(cwd, p);
  const rulesPath = resolvePath(values.RULES_FILE);
  const categories = Object.freeze([...values.CATEGORIES]);
  const defaultHints = DEFAULT_CATEGORY_HINTS.filter(h => categories.includes(h.category));

  return Object.freeze({
    recencyDays: values.EMAIL_DAYS_BACK,
    claimLabel: values.GMAIL_LABEL_NAME,
    model: Object.freeze({
      name: values.MODEL_NAME,
      temperature: values.MODEL_TEMPERATURE,
      apiKey: values.GOOGLE_API_KEY,
      project: values.PROJECT_ID,
      location: values.LOCATION,
      pricing: Object.freeze({
        inputPerMillion: values.MODEL_INPUT_PRICE_PER_MILLION,
        outputPerMillion: values.MODEL_OUTPUT_PRICE_PER_MILLION,
      }),
    }),
    categories,
    providers: registry,
    accounts: Object.freeze(registry.getAccounts()),
    // Later entries win ties, so the rules file goes last
    categoryHints: Object.freeze([...defaultHints, ...loadRules(rulesPath, categories)]),
    rateLimit: Object.freeze({
      maxCalls: values.API_RATE_LIMIT_CALLS,
      periodMs: values.API_RATE_LIMIT_PERIOD * 1000,
      dailyBudget: values.DAILY_BUDGET_USD,
      alertThreshold: values.BUDGET_ALERT_THRESHOLD,
    }),
    sheets: Object.freeze({
      spreadsheetId: values.SPREADSHEET_ID,
      range: values.SHEET_RANGE,
    }),
    paths: Object.freeze({
      db: resolvePath(values.DB_PATH),
      output: resolvePath(values.OUTPUT_FILE),
      rules: rulesPath,
      credentials: resolvePath(values.CREDENTIALS_PATH),
      token: resolvePath(values.TOKEN_PATH),
    }),
    notificationEmail: values.NOTIFICATION_EMAIL,
    showUsageSummary: values.SHOW_USAGE_SUMMARY,
  });
}

/**
 * Create a template rules.json file
 */
export function createRulesTemplate(rulesPath: string = path.join(process.cwd(), 'rules.json')): boolean {
  if (fs.existsSync(rulesPath)) {
    console.warn(`⚠️  ${rulesPath} already exists, leaving it untouched.`);
    return false;
  }

  const template: RulesConfig = {
    category_hints: [
      { match: 'Corner Bakery', category: 'Food & Dining' },
      { match: 'Metro Card', category: 'Transport' },
    ],
  };

  fs.writeJsonSync(rulesPath, template, { spaces: 2 });
  console.log(`Created template rules at ${rulesPath}`);
  console.log(`Categories you can use: ${DEFAULT_CATEGORIES.join(', ')}`);
  return true;
}
