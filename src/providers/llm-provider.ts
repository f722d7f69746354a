/**
 * LLMProvider interface – plug in any text-generation backend.
 * Providers are stateless with respect to the model: the gateway picks a
 * provider by model identifier and passes the model on every request.
 */
export interface GenerationParams {
  system?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface GenerationRequest extends GenerationParams {
  prompt: string;
  model: string;
  /** Aborted by the gateway when the per-call timeout fires. */
  signal?: AbortSignal;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
}

export interface GenerationResult {
  text: string;
  usage: TokenUsage;
}

export interface LLMProvider {
  readonly name: string;

  /**
   * Generate a completion for one prompt.
   * Failures should be thrown as ProviderError so the gateway can tell
   * transient faults from permanent ones.
   */
  generate(request: GenerationRequest): Promise<GenerationResult>;
}

export const ZERO_USAGE: TokenUsage = Object.freeze({ promptTokens: 0, completionTokens: 0 });
