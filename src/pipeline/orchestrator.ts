import { BatchResult, Candidate, CoarseRecord, MailboxBackend, MessageRef, RunCounts, Stage, StageFailure, Transaction } from '../types';
import { MessageFilter } from '../gmail/filter';
import { FieldExtractor } from '../providers/extractor';
import { TransactionValidator, describeValidationFailure } from '../validation/transaction';
import { DEFAULT_RETRY_POLICY, RetryPolicy, StageError, formatError, retryWithPolicy } from '../utils/errors';

export type PipelineState =
  | 'Idle'
  | 'Filtering'
  | 'Extracting'
  | 'Resolving'
  | 'Validating'
  | 'Claimed'
  | 'Skipped'
  | 'Completed'
  | 'Aborted';

export interface RecordResolver {
  resolve(record: CoarseRecord, candidateId?: string): Promise<Record<string, unknown>>;
}

export interface PipelineDeps {
  mailbox: MailboxBackend;
  filter: MessageFilter;
  extractor: FieldExtractor;
  resolver: RecordResolver;
  validator: TransactionValidator;
  retryPolicy?: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
}

export interface RunOptions {
  // Skip claiming; nothing is marked in the mailbox
  dryRun?: boolean;
  // Checked between candidates
  signal?: AbortSignal;
  now?: Date;
}

interface RunContext {
  dryRun: boolean;
  transactions: Transaction[];
  failures: StageFailure[];
  counts: RunCounts;
}

function emptyCounts(): RunCounts {
  return {
    found: 0,
    claimed: 0,
    validated: 0,
    failed: { claim: 0, fetch: 0, extract: 0, resolve: 0, validate: 0 },
  };
}

/**
 * One pipeline run: filter, then for each candidate in discovery order
 * claim -> fetch -> extract -> resolve -> validate.
 *
 * Candidates are claimed before they are processed. A crash mid-batch therefore never
 * reprocesses a candidate, and a claimed candidate that fails later is a permanent skip.
 * If the claim itself fails the candidate is left untouched for the next run.
 */
export class PipelineOrchestrator {
  private current: PipelineState = 'Idle';

  constructor(private deps: PipelineDeps) {}

  get state(): PipelineState {
    return this.current;
  }

  async run(options: RunOptions = {}): Promise<BatchResult> {
    const startedAt = new Date();
    this.current = 'Filtering';

    let refs: MessageRef[];
    try {
      refs = await this.deps.filter.findCandidates(options.now);
    } catch (error: unknown) {
      this.current = 'Aborted';
      console.error('Failed to retrieve candidate messages:', formatError(error));
      throw error;
    }

    const ctx: RunContext = {
      dryRun: options.dryRun ?? false,
      transactions: [],
      failures: [],
      counts: emptyCounts(),
    };
    ctx.counts.found = refs.length;

    let interrupted = false;
    for (let i = 0; i < refs.length; i++) {
      if (options.signal?.aborted) {
        interrupted = true;
        console.warn(`Run interrupted; ${refs.length - i} candidates left for the next run.`);
        break;
      }
      await this.processCandidate(refs[i], ctx);
    }

    this.current = 'Completed';
    return {
      transactions: ctx.transactions,
      failures: ctx.failures,
      counts: ctx.counts,
      interrupted,
      startedAt,
      finishedAt: new Date(),
    };
  }

  private async processCandidate(ref: MessageRef, ctx: RunContext): Promise<void> {
    let stage: Stage = 'claim';
    try {
      if (!ctx.dryRun) {
        try {
          await this.withRetry(() => this.deps.mailbox.claim(ref.id), ref.id, 'claim');
        } catch (error: unknown) {
          this.fail(ctx, ref.id, 'claim', `Could not claim message, will retry next run: ${formatError(error)}`);
          return;
        }
        ctx.counts.claimed++;
      }

      stage = 'fetch';
      let candidate: Candidate;
      try {
        candidate = await this.withRetry(() => this.deps.mailbox.getMessage(ref.id), ref.id, 'fetch');
      } catch (error: unknown) {
        this.fail(ctx, ref.id, 'fetch', `Could not fetch message: ${formatError(error)}`);
        return;
      }

      stage = 'extract';
      this.current = 'Extracting';
      const extraction = this.deps.extractor.extract(candidate);
      if (!extraction.ok) {
        this.fail(ctx, ref.id, 'extract', extraction.message);
        return;
      }

      stage = 'resolve';
      this.current = 'Resolving';
      let resolved: Record<string, unknown>;
      try {
        resolved = await this.deps.resolver.resolve(extraction.record, ref.id);
      } catch (error: unknown) {
        this.fail(ctx, ref.id, 'resolve', error instanceof StageError ? error.message : formatError(error));
        return;
      }

      stage = 'validate';
      this.current = 'Validating';
      const validation = this.deps.validator.validate(resolved);
      if (!validation.ok) {
        this.fail(ctx, ref.id, 'validate', describeValidationFailure(validation));
        return;
      }

      ctx.transactions.push(validation.transaction);
      ctx.counts.validated++;
      this.current = 'Claimed';
      const t = validation.transaction;
      console.log(`[OK] ${t.account}: ${t.date} ${t.time} - ${t.merchant} - ${t.amount} ${t.currency} (${t.category})`);
    } catch (error: unknown) {
      this.fail(ctx, ref.id, stage, `Unexpected error: ${formatError(error)}`);
    }
  }

  private withRetry<T>(fn: () => Promise<T>, candidateId: string, stage: Stage): Promise<T> {
    return retryWithPolicy(fn, this.deps.retryPolicy ?? DEFAULT_RETRY_POLICY, {
      sleep: this.deps.sleep,
      context: { candidateId, stage },
      onRetry: (error, attempt) => {
        console.warn(`Retrying ${stage} for ${candidateId} (attempt ${attempt}): ${error.message}`);
      },
    });
  }

  private fail(ctx: RunContext, candidateId: string, stage: Stage, reason: string) {
    ctx.failures.push({ candidateId, stage, reason });
    ctx.counts.failed[stage]++;
    this.current = 'Skipped';
    console.warn(`[SKIP] ${candidateId} (${stage}): ${reason}`);
  }
}
