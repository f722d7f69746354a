import type { TokenUsage } from "../../providers/llm-provider.js";

/** USD per one million tokens. */
export interface ModelPricing {
  prompt: number;
  completion: number;
}

/** Matched by longest model-id prefix; unknown models cost 0. */
export const DEFAULT_PRICING: Readonly<Record<string, ModelPricing>> = {
  "gpt-4o-mini": { prompt: 0.15, completion: 0.6 },
  "gpt-4o": { prompt: 2.5, completion: 10 },
  "gpt-4.1-mini": { prompt: 0.4, completion: 1.6 },
  "gpt-4.1": { prompt: 2, completion: 8 },
  "claude-3-5-haiku": { prompt: 0.8, completion: 4 },
  "claude-3-5-sonnet": { prompt: 3, completion: 15 },
  "claude-3-haiku": { prompt: 0.25, completion: 1.25 },
};

export interface UsageTotals {
  calls: number;
  failedCalls: number;
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  estimatedCostUsd: number;
}

export interface UsageSnapshot extends UsageTotals {
  byProvider: Record<string, UsageTotals>;
  byModel: Record<string, UsageTotals>;
}

export interface UsageEntry {
  provider: string;
  model: string;
  usage: TokenUsage;
  ok: boolean;
}

/**
 * Cumulative usage accounting for every gateway attempt.
 *
 * One tracker is created per process (or per test) and handed to the
 * gateway. `record` runs to completion without awaiting, so concurrent
 * callers on the event loop never interleave inside an update.
 */
export class UsageTracker {
  private readonly totals = emptyTotals();
  private readonly byProvider = new Map<string, UsageTotals>();
  private readonly byModel = new Map<string, UsageTotals>();
  private readonly pricing: Readonly<Record<string, ModelPricing>>;
  private readonly pricingKeys: string[];

  constructor(pricing: Readonly<Record<string, ModelPricing>> = DEFAULT_PRICING) {
    this.pricing = pricing;
    this.pricingKeys = Object.keys(pricing).sort((a, b) => b.length - a.length);
  }

  record(entry: UsageEntry): void {
    const cost = this.estimateCost(entry.model, entry.usage);
    const targets = [
      this.totals,
      bucket(this.byProvider, entry.provider),
      bucket(this.byModel, entry.model),
    ];
    for (const t of targets) {
      t.calls += 1;
      if (!entry.ok) t.failedCalls += 1;
      t.promptTokens += entry.usage.promptTokens;
      t.completionTokens += entry.usage.completionTokens;
      t.totalTokens += entry.usage.promptTokens + entry.usage.completionTokens;
      t.estimatedCostUsd += cost;
    }
  }

  /** Read-only copy of the current totals. */
  snapshot(): UsageSnapshot {
    return {
      ...this.totals,
      byProvider: Object.fromEntries([...this.byProvider].map(([k, v]) => [k, { ...v }])),
      byModel: Object.fromEntries([...this.byModel].map(([k, v]) => [k, { ...v }])),
    };
  }

  estimateCost(model: string, usage: TokenUsage): number {
    const bare = model.includes("/") ? model.slice(model.indexOf("/") + 1) : model;
    const key = this.pricingKeys.find((k) => bare.startsWith(k));
    const price = key ? this.pricing[key] : undefined;
    if (!price) return 0;
    return (usage.promptTokens * price.prompt + usage.completionTokens * price.completion) / 1_000_000;
  }
}

function emptyTotals(): UsageTotals {
  return {
    calls: 0,
    failedCalls: 0,
    promptTokens: 0,
    completionTokens: 0,
    totalTokens: 0,
    estimatedCostUsd: 0,
  };
}

function bucket(map: Map<string, UsageTotals>, key: string): UsageTotals {
  let totals = map.get(key);
  if (!totals) {
    totals = emptyTotals();
    map.set(key, totals);
  }
  return totals;
}
