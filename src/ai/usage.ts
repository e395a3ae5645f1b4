export interface ModelPricing {
  inputPerMillion: number; // USD per 1M input tokens
  outputPerMillion: number; // USD per 1M output tokens
}

export interface ModelCallRecord {
  modelId: string;
  candidateId?: string;
  inputTokens: number;
  outputTokens: number;
  estimated: boolean; // true when token counts were guessed from text length
  cost: number;
  latencyMs: number;
  success: boolean;
}

export interface UsageRecorder {
  record(call: ModelCallRecord): void;
}

export interface ModelUsageSummary {
  modelId: string;
  calls: number;
  errors: number;
  inputTokens: number;
  outputTokens: number;
  cost: number;
  avgLatencyMs: number;
}

const CHARS_PER_TOKEN = 4;

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

export function estimateCost(pricing: ModelPricing, inputTokens: number, outputTokens: number): number {
  return (inputTokens / 1_000_000) * pricing.inputPerMillion + (outputTokens / 1_000_000) * pricing.outputPerMillion;
}

/**
 * Keeps one record per model invocation so spend can be attributed after the run.
 */
export class UsageMonitor implements UsageRecorder {
  private calls: ModelCallRecord[] = [];

  record(call: ModelCallRecord): void {
    this.calls.push(call);
  }

  getCalls(): ModelCallRecord[] {
    return [...this.calls];
  }

  get callCount(): number {
    return this.calls.length;
  }

  get totalCost(): number {
    return this.calls.reduce((sum, c) => sum + c.cost, 0);
  }

  summarize(): ModelUsageSummary[] {
    const byModel = new Map<string, ModelUsageSummary & { totalLatency: number }>();

    for (const call of this.calls) {
      let entry = byModel.get(call.modelId);
      if (!entry) {
        entry = {
          modelId: call.modelId,
          calls: 0,
          errors: 0,
          inputTokens: 0,
          outputTokens: 0,
          cost: 0,
          avgLatencyMs: 0,
          totalLatency: 0,
        };
        byModel.set(call.modelId, entry);
      }
      entry.calls++;
      if (!call.success) entry.errors++;
      entry.inputTokens += call.inputTokens;
      entry.outputTokens += call.outputTokens;
      entry.cost += call.cost;
      entry.totalLatency += call.latencyMs;
      entry.avgLatencyMs = entry.totalLatency / entry.calls;
    }

    return [...byModel.values()].map(({ totalLatency: _totalLatency, ...summary }) => summary);
  }

  logSummary(): void {
    const summary = this.summarize();
    if (summary.length === 0) {
      console.log('No model calls were made.');
      return;
    }

    console.log('\nModel usage:');
    console.log('─'.repeat(60));
    for (const s of summary) {
      console.log(`Model: ${s.modelId}`);
      console.log(`  Calls: ${s.calls} (${s.errors} failed)`);
      console.log(`  Tokens: ${s.inputTokens} in / ${s.outputTokens} out`);
      console.log(`  Estimated cost: $${s.cost.toFixed(4)}`);
      console.log(`  Avg latency: ${Math.round(s.avgLatencyMs)}ms`);
    }
    console.log('─'.repeat(60));
  }
}
