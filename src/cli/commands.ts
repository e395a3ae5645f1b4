import { GmailClient } from '../gmail/client';
import { authorize } from '../gmail/auth';
import { MessageFilter } from '../gmail/filter';
import { FieldExtractor } from '../providers/extractor';
import { RulesEngine } from '../rules/engine';
import { GeminiModel } from '../ai/gemini';
import { CategoryResolver } from '../ai/resolver';
import { UsageMonitor } from '../ai/usage';
import { RateBudgetTracker } from '../limits/tracker';
import { TransactionValidator } from '../validation/transaction';
import { PipelineOrchestrator } from '../pipeline/orchestrator';
import { SheetsSink } from '../sheets/client';
import { initDB, RunLedger } from '../db';
import { AppConfig, createRulesTemplate, loadConfig } from '../config';
import { BatchResult, OutputSink, STAGES, Transaction } from '../types';
import {
  EmailSender,
  SyncPhase,
  sendFailureNotification,
  sendRunNotification,
  sendWarningNotification,
  totalFailed,
} from '../utils/notifications';
import { writeOutputFile } from '../utils/output';
import { formatError } from '../utils/errors';

export interface SyncOptions {
  days?: number;
  dryRun?: boolean;
  sheets?: boolean; // --no-sheets
  output?: boolean; // --no-output
  notify?: boolean;
}

export interface SyncDeps {
  orchestrator: PipelineOrchestrator;
  ledger: RunLedger;
  sink?: OutputSink;
  outputFile?: string;
  notifier?: { sender: EmailSender; recipient: string };
  // Filled by the rate/budget tracker while the run is in progress
  budgetAlerts?: string[];
}

function printRunSummary(result: BatchResult, dryRun: boolean) {
  const prefix = dryRun ? '[Dry Run] ' : '';
  console.log(`\n${prefix}Sync complete.`);
  console.log(`Found: ${result.counts.found}`);
  if (!dryRun) console.log(`Claimed: ${result.counts.claimed}`);
  console.log(`Transactions: ${result.counts.validated}`);
  console.log(`Skipped: ${totalFailed(result)}`);
  for (const stage of STAGES) {
    if (result.counts.failed[stage] > 0) {
      console.log(`  ${stage}: ${result.counts.failed[stage]}`);
    }
  }
  if (result.interrupted) {
    console.warn('Run was interrupted before every message was processed.');
  }
}

async function reportFailure(deps: SyncDeps, error: unknown, phase: SyncPhase) {
  if (deps.notifier) {
    await sendFailureNotification(deps.notifier.sender, error, phase, deps.notifier.recipient);
  }
}

/**
 * Upload this run's rows behind any rows an earlier failed upload left in the ledger.
 * On failure the new rows join the pending ones, so nothing claimed is lost.
 */
async function upload(sink: OutputSink, ledger: RunLedger, runId: number, transactions: Transaction[]) {
  const pending = ledger.listPending();
  try {
    await sink.append([...pending.map(p => p.transaction), ...transactions]);
  } catch (error: unknown) {
    ledger.savePending(runId, transactions);
    const held = pending.length + transactions.length;
    console.warn(`⚠️  ${held} rows held in the ledger for the next upload.`);
    throw error;
  }
  if (pending.length > 0) {
    ledger.clearPending(pending.map(p => p.id));
    console.log(`Re-sent ${pending.length} rows held back by an earlier failed upload.`);
  }
}

/**
 * One sync run against already constructed collaborators. The ledger records the run
 * before anything is uploaded, so a failing upload still leaves a trace of what was claimed.
 */
export async function runSync(deps: SyncDeps, options: { dryRun?: boolean; signal?: AbortSignal } = {}): Promise<BatchResult> {
  const dryRun = options.dryRun ?? false;
  const startedAt = new Date();

  let result: BatchResult;
  try {
    result = await deps.orchestrator.run({ dryRun, signal: options.signal });
  } catch (error: unknown) {
    if (!dryRun) {
      deps.ledger.recordAbort(startedAt, formatError(error));
      await reportFailure(deps, error, 'search');
    }
    throw error;
  }

  printRunSummary(result, dryRun);
  if (dryRun) {
    return result;
  }

  if (deps.notifier) {
    for (const alert of deps.budgetAlerts ?? []) {
      await sendWarningNotification(deps.notifier.sender, alert, deps.notifier.recipient);
    }
  }

  let runId: number;
  try {
    if (deps.outputFile) {
      await writeOutputFile(deps.outputFile, result.transactions);
    }
    runId = deps.ledger.recordRun(result);
  } catch (error: unknown) {
    await reportFailure(deps, error, 'output');
    throw error;
  }

  if (deps.sink) {
    try {
      await upload(deps.sink, deps.ledger, runId, result.transactions);
    } catch (error: unknown) {
      await reportFailure(deps, error, 'upload');
      throw error;
    }
  }

  if (deps.notifier) {
    await sendRunNotification(deps.notifier.sender, result, deps.notifier.recipient);
  }

  return result;
}

function buildOrchestrator(
  config: AppConfig,
  gmail: GmailClient,
  days: number,
  usage: UsageMonitor,
  budgetAlerts: string[]
): PipelineOrchestrator {
  const tracker = new RateBudgetTracker({
    maxCalls: config.rateLimit.maxCalls,
    periodMs: config.rateLimit.periodMs,
    dailyBudget: config.rateLimit.dailyBudget,
    alertThreshold: config.rateLimit.alertThreshold,
    onAlert: message => budgetAlerts.push(message),
  });

  const model = new GeminiModel({
    model: config.model.name,
    temperature: config.model.temperature,
    apiKey: config.model.apiKey,
    project: config.model.project,
    location: config.model.location,
  });

  const resolver = new CategoryResolver(model, {
    categories: config.categories,
    accounts: config.accounts,
    rules: new RulesEngine([...config.categoryHints]),
    pricing: config.model.pricing,
    gate: tracker,
    usage,
  });

  return new PipelineOrchestrator({
    mailbox: gmail,
    filter: new MessageFilter(gmail, config.providers.getAllParsers(), { days, claimLabel: config.claimLabel }),
    extractor: new FieldExtractor(config.providers),
    resolver,
    validator: new TransactionValidator({ categories: config.categories, accounts: config.accounts }),
  });
}

export async function sync(options: SyncOptions = {}) {
  const dryRun = options.dryRun ?? false;
  const upload = !dryRun && options.sheets !== false;
  const config = loadConfig(process.env, { requireSheets: upload });

  const auth = () => authorize({ credentialsPath: config.paths.credentials, tokenPath: config.paths.token });
  const gmail = new GmailClient(config.claimLabel, auth);
  try {
    await gmail.init();
  } catch (error: unknown) {
    console.error('Failed to initialize Gmail client:', formatError(error));
    throw error;
  }

  const usage = new UsageMonitor();
  const budgetAlerts: string[] = [];
  const orchestrator = buildOrchestrator(config, gmail, options.days ?? config.recencyDays, usage, budgetAlerts);

  const spreadsheetId = config.sheets.spreadsheetId;
  const sink = upload && spreadsheetId
    ? new SheetsSink({ spreadsheetId, range: config.sheets.range }, auth)
    : undefined;

  let notifier: SyncDeps['notifier'];
  if (options.notify) {
    if (config.notificationEmail) {
      notifier = { sender: gmail, recipient: config.notificationEmail };
    } else {
      console.warn('⚠️  --notify given but NOTIFICATION_EMAIL is not set; skipping the notification.');
    }
  }

  const controller = new AbortController();
  const onInterrupt = () => {
    console.warn('\nInterrupt received, stopping after the current message...');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  const db = initDB(config.paths.db);
  try {
    await runSync(
      {
        orchestrator,
        ledger: new RunLedger(db),
        sink,
        outputFile: options.output === false ? undefined : config.paths.output,
        notifier,
        budgetAlerts,
      },
      { dryRun, signal: controller.signal }
    );
  } finally {
    process.removeListener('SIGINT', onInterrupt);
    db.close();
    if (config.showUsageSummary) {
      usage.logSummary();
    }
  }
}

export function listFailures(options: { limit?: number } = {}) {
  const config = loadConfig(process.env, { requireModel: false });
  const db = initDB(config.paths.db);
  try {
    const ledger = new RunLedger(db);
    const lastRun = ledger.lastRun();
    if (lastRun) {
      console.log(`Last run #${lastRun.id} (${lastRun.status}) at ${lastRun.started_at}: ` +
        `${lastRun.validated}/${lastRun.found} recorded, ${lastRun.failed} skipped`);
    } else {
      console.log('No runs recorded yet.');
    }

    const pending = ledger.listPending();
    if (pending.length > 0) {
      console.log(`${pending.length} transactions are waiting for the next sheet upload.`);
    }

    const failures = ledger.listFailures(options.limit);
    if (failures.length === 0) {
      console.log('No stage failures recorded.');
      return;
    }

    const skipped = failures.filter(f => !f.retryable);
    const retrying = failures.filter(f => f.retryable);
    if (skipped.length > 0) {
      console.log(`\nSkipped for good (${skipped.length}):`);
      for (const f of skipped) {
        console.log(`[run ${f.runId}] ${f.recordedAt} ${f.candidateId} (${f.stage}): ${f.reason}`);
      }
    }
    if (retrying.length > 0) {
      console.log(`\nNot claimed, retried on the next run (${retrying.length}):`);
      for (const f of retrying) {
        console.log(`[run ${f.runId}] ${f.recordedAt} ${f.candidateId}: ${f.reason}`);
      }
    }
  } finally {
    db.close();
  }
}

export function setupRules() {
  createRulesTemplate();
}
