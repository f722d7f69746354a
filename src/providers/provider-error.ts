import type { TokenUsage } from "./llm-provider.js";

/** HTTP statuses worth another attempt: timeouts, conflicts, rate limits, server faults. */
const TRANSIENT_STATUSES = new Set([408, 409, 429]);

/** Error names the OpenAI and Anthropic SDKs use for network-level failures. */
const TRANSIENT_ERROR_NAMES = new Set([
  "AbortError",
  "TimeoutError",
  "APIConnectionError",
  "APIConnectionTimeoutError",
  "APIUserAbortError",
  "FetchError",
]);

const NETWORK_FAULT = /timed? ?out|ECONNRESET|ECONNREFUSED|ETIMEDOUT|EAI_AGAIN|socket hang up|fetch failed|network/i;

export class ProviderError extends Error {
  readonly provider: string;
  readonly transient: boolean;
  readonly status?: number;
  /** Tokens the provider reported before failing, when known. */
  readonly usage?: TokenUsage;

  constructor(
    message: string,
    options: { provider: string; transient: boolean; status?: number; usage?: TokenUsage; cause?: unknown },
  ) {
    super(message, { cause: options.cause });
    this.name = "ProviderError";
    this.provider = options.provider;
    this.transient = options.transient;
    this.status = options.status;
    this.usage = options.usage;
  }
}

export function isTransientStatus(status: number): boolean {
  return TRANSIENT_STATUSES.has(status) || status >= 500;
}

/**
 * Normalise anything an SDK throws into a ProviderError.
 * Errors carrying an HTTP status are classified by status; errors without
 * one are transient only when they look like network faults.
 */
export function toProviderError(error: unknown, provider: string): ProviderError {
  if (error instanceof ProviderError) return error;

  const status = readStatus(error);
  const message = error instanceof Error ? error.message : String(error);

  if (status !== undefined) {
    return new ProviderError(`${provider} request failed (${status}): ${message}`, {
      provider,
      transient: isTransientStatus(status),
      status,
      cause: error,
    });
  }

  const name = error instanceof Error ? error.name : "";
  const transient = TRANSIENT_ERROR_NAMES.has(name) || NETWORK_FAULT.test(message);
  return new ProviderError(`${provider} request failed: ${message}`, { provider, transient, cause: error });
}

function readStatus(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null || !("status" in error)) return undefined;
  const { status } = error;
  return typeof status === "number" ? status : undefined;
}
