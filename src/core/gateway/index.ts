import { CallError, describeError } from "../errors/index.js";
import { createLogger } from "../logging/index.js";
import type { UsageTracker } from "../usage/index.js";
import { ProviderRegistry, type ResolvedProvider } from "../../providers/index.js";
import {
  ZERO_USAGE,
  type GenerationParams,
  type GenerationResult,
  type LLMProvider,
  type TokenUsage,
} from "../../providers/llm-provider.js";
import { ProviderError, toProviderError } from "../../providers/provider-error.js";

const logger = createLogger("gateway");

export interface GatewayConfig {
  usage: UsageTracker;
  providers?: ProviderRegistry;
  /** Total attempt budget per invoke (default 3). */
  maxRetries?: number;
  /** Base backoff; attempt n waits retryDelayMs * 2^(n-1) (default 1000). */
  retryDelayMs?: number;
  /** Per-attempt timeout in ms; 0 disables it (default 120000). */
  timeoutMs?: number;
  /** Defaults applied under every call's own params. */
  defaults?: GenerationParams;
  sleep?: (ms: number) => Promise<void>;
}

export interface InvokeResult {
  text: string;
  usage: TokenUsage;
  attempts: number;
  provider: string;
  model: string;
}

/**
 * LLM Gateway
 * One call surface over every provider:
 *   invoke(prompt, model, params) → text
 *
 * Each attempt is a transition  attempting → (succeeded | backoff | failed):
 *   - success             → usage recorded, text returned
 *   - transient failure   → usage recorded, back off, next attempt
 *   - permanent failure   → usage recorded, CallError{invalid}
 *   - budget spent        → CallError{exhausted} carrying the last cause
 */
export class LLMGateway {
  private readonly usage: UsageTracker;
  private readonly providers: ProviderRegistry;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly timeoutMs: number;
  private readonly defaults: GenerationParams;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(config: GatewayConfig) {
    this.usage = config.usage;
    this.providers = config.providers ?? new ProviderRegistry();
    this.maxRetries = Math.max(1, config.maxRetries ?? 3);
    this.retryDelayMs = config.retryDelayMs ?? 1000;
    this.timeoutMs = config.timeoutMs ?? 120_000;
    this.defaults = config.defaults ?? {};
    this.sleep = config.sleep ?? sleep;
  }

  async invoke(prompt: string, model: string, params: GenerationParams = {}): Promise<string> {
    const result = await this.invokeDetailed(prompt, model, params);
    return result.text;
  }

  async invokeDetailed(prompt: string, model: string, params: GenerationParams = {}): Promise<InvokeResult> {
    if (!prompt.trim()) {
      throw new CallError("invalid", "Prompt must be non-empty", { attempts: 0 });
    }
    if (!model.trim()) {
      throw new CallError("invalid", "Model identifier must be non-empty", { attempts: 0 });
    }

    let resolved: ResolvedProvider;
    try {
      resolved = this.providers.resolve(model);
    } catch (error) {
      throw new CallError("invalid", `No usable provider for model "${model}": ${describeError(error)}`, {
        attempts: 0,
        cause: error,
      });
    }

    const { provider } = resolved;
    const request = { ...this.defaults, ...params, prompt, model: resolved.model };

    let attempt = 0;
    let lastCause: ProviderError | undefined;

    while (attempt < this.maxRetries) {
      attempt += 1;
      try {
        const result = await this.attempt(provider, request);
        this.usage.record({ provider: provider.name, model: resolved.model, usage: result.usage, ok: true });
        if (attempt > 1) {
          logger.info({ provider: provider.name, model: resolved.model, attempt }, "Call succeeded after retry");
        }
        return { ...result, attempts: attempt, provider: provider.name, model: resolved.model };
      } catch (error) {
        const failure = toProviderError(error, provider.name);
        this.usage.record({
          provider: provider.name,
          model: resolved.model,
          usage: failure.usage ?? ZERO_USAGE,
          ok: false,
        });
        lastCause = failure;

        if (!failure.transient) {
          logger.error({ provider: provider.name, model: resolved.model, attempt, error: failure.message }, "Call failed");
          throw new CallError("invalid", failure.message, { attempts: attempt, cause: failure });
        }

        logger.warn(
          { provider: provider.name, model: resolved.model, attempt, maxRetries: this.maxRetries, error: failure.message },
          "Transient call failure",
        );
        if (attempt < this.maxRetries) {
          await this.sleep(this.backoff(attempt));
        }
      }
    }

    logger.error({ provider: provider.name, model: resolved.model, attempts: attempt }, "Retries exhausted");
    throw new CallError(
      "exhausted",
      `Call to ${provider.name}/${resolved.model} failed after ${attempt} attempts: ${lastCause?.message ?? "unknown cause"}`,
      { attempts: attempt, cause: lastCause },
    );
  }

  private backoff(attempt: number): number {
    return this.retryDelayMs * 2 ** (attempt - 1);
  }

  /** One provider call, aborted and failed as transient when the timeout fires. */
  private async attempt(
    provider: LLMProvider,
    request: GenerationParams & { prompt: string; model: string },
  ): Promise<GenerationResult> {
    if (this.timeoutMs <= 0) {
      return provider.generate(request);
    }

    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(
          new ProviderError(`${provider.name} call timed out after ${this.timeoutMs}ms`, {
            provider: provider.name,
            transient: true,
          }),
        );
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([provider.generate({ ...request, signal: controller.signal }), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
