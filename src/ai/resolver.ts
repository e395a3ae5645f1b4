import { CoarseRecord, ModelBackend, ModelResponse, RateBudgetGate } from '../types';
import { RulesEngine } from '../rules/engine';
import {
  AppError,
  DEFAULT_RETRY_POLICY,
  ErrorType,
  RetryPolicy,
  StageError,
  formatError,
  retryWithPolicy,
  sleep,
} from '../utils/errors';
import { buildPrompt } from './prompt';
import { decodeModelRecord } from './response';
import { ModelPricing, UsageRecorder, estimateCost, estimateTokens } from './usage';

// A seven-field JSON object is rarely longer than this
const EXPECTED_OUTPUT_TOKENS = 120;

export interface ResolverOptions {
  categories: readonly string[];
  accounts: readonly string[];
  rules: RulesEngine;
  pricing: ModelPricing;
  retryPolicy?: RetryPolicy;
  gate?: RateBudgetGate;
  usage?: UsageRecorder;
  maxGateWaits?: number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Turns a CoarseRecord into an untrusted field mapping via the model, with category hints applied.
 * Every failure leaves as a StageError for the 'resolve' stage.
 */
export class CategoryResolver {
  private calls = 0;

  constructor(private model: ModelBackend, private options: ResolverOptions) {}

  get callCount(): number {
    return this.calls;
  }

  buildPrompt(record: CoarseRecord): string {
    return buildPrompt(record, {
      categories: this.options.categories,
      accounts: this.options.accounts,
      hints: this.options.rules.getHints(),
    });
  }

  async resolve(record: CoarseRecord, candidateId?: string): Promise<Record<string, unknown>> {
    const prompt = this.buildPrompt(record);

    let response: ModelResponse;
    try {
      response = await retryWithPolicy(
        () => this.invoke(prompt, candidateId),
        this.options.retryPolicy ?? DEFAULT_RETRY_POLICY,
        {
          sleep: this.options.sleep,
          context: { candidateId, model: this.model.modelId },
          onRetry: (error, attempt, delayMs) => {
            console.warn(`Retrying model call for ${candidateId ?? 'record'} (attempt ${attempt}, ${delayMs}ms): ${error.message}`);
          },
        }
      );
    } catch (error: unknown) {
      throw new StageError('resolve', `Model call failed: ${formatError(error)}`, error);
    }

    const decoded = decodeModelRecord(response.text);
    if (!decoded.ok) {
      throw new StageError('resolve', decoded.reason);
    }

    return this.options.rules.apply(decoded.value);
  }

  private async invoke(prompt: string, candidateId?: string): Promise<ModelResponse> {
    const estimatedInput = estimateTokens(prompt);
    await this.waitForGate(estimateCost(this.options.pricing, estimatedInput, EXPECTED_OUTPUT_TOKENS));

    this.calls++;
    const started = Date.now();
    try {
      const response = await this.model.generate(prompt);
      const inputTokens = response.usage?.inputTokens;
      const outputTokens = response.usage?.outputTokens;
      const estimated = inputTokens === undefined || outputTokens === undefined;
      const input = inputTokens ?? estimatedInput;
      const output = outputTokens ?? estimateTokens(response.text);

      this.options.usage?.record({
        modelId: this.model.modelId,
        candidateId,
        inputTokens: input,
        outputTokens: output,
        estimated,
        cost: estimateCost(this.options.pricing, input, output),
        latencyMs: Date.now() - started,
        success: true,
      });
      return response;
    } catch (error: unknown) {
      this.options.usage?.record({
        modelId: this.model.modelId,
        candidateId,
        inputTokens: estimatedInput,
        outputTokens: 0,
        estimated: true,
        cost: 0,
        latencyMs: Date.now() - started,
        success: false,
      });
      throw error;
    }
  }

  private async waitForGate(estimatedCost: number): Promise<void> {
    const gate = this.options.gate;
    if (!gate) return;

    const wait = this.options.sleep ?? sleep;
    const maxWaits = this.options.maxGateWaits ?? 20;

    for (let waits = 0; waits <= maxWaits; waits++) {
      const decision = gate.beforeCall(estimatedCost);
      if (decision.action === 'proceed') return;

      if (decision.action === 'deny') {
        throw new AppError({
          type: ErrorType.RATE_LIMIT,
          message: decision.reason,
          retryable: false,
          context: { budget: true },
        });
      }

      if (waits < maxWaits) {
        console.log(`Rate limit reached, waiting ${Math.ceil(decision.retryAfterMs / 1000)}s before the next model call...`);
        await wait(decision.retryAfterMs);
      }
    }

    throw new AppError({
      type: ErrorType.RATE_LIMIT,
      message: `Still rate limited after ${maxWaits} waits`,
      retryable: false,
    });
  }
}
