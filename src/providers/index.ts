/**
 * Provider registry – maps model identifiers to LLM backends.
 *
 * Routing:
 *   1. "openai/…", "anthropic/…", "mock/…" → explicit provider
 *   2. "mock" or "mock-*"                  → MockLLM (tests / offline dev)
 *   3. "claude-*"                          → Anthropic
 *   4. anything else                       → OpenAI
 *
 * Usage:
 *   const registry = new ProviderRegistry();
 *   const { provider, model } = registry.resolve("claude-3-5-haiku-latest");
 */
export { MockLLM } from "./mock-llm.js";
export { OpenAILLM } from "./openai-llm.js";
export { AnthropicLLM } from "./anthropic-llm.js";
export { ProviderError, toProviderError } from "./provider-error.js";
export type {
  LLMProvider,
  GenerationParams,
  GenerationRequest,
  GenerationResult,
  TokenUsage,
} from "./llm-provider.js";

import type { LLMProvider } from "./llm-provider.js";
import { MockLLM } from "./mock-llm.js";
import { OpenAILLM } from "./openai-llm.js";
import { AnthropicLLM } from "./anthropic-llm.js";

export const PROVIDER_NAMES = ["openai", "anthropic", "mock"] as const;
export type ProviderName = (typeof PROVIDER_NAMES)[number];

export type ProviderFactories = Partial<Record<ProviderName, () => LLMProvider>>;

export interface ResolvedProvider {
  provider: LLMProvider;
  /** Model identifier with any "provider/" prefix removed. */
  model: string;
}

export function createLLMProvider(name: ProviderName): LLMProvider {
  switch (name) {
    case "mock":
      return new MockLLM();
    case "openai":
      return new OpenAILLM();
    case "anthropic":
      return new AnthropicLLM();
  }
}

/** Pick the provider for a model identifier. */
export function routeModel(model: string): { providerName: ProviderName; model: string } {
  const slash = model.indexOf("/");
  if (slash > 0) {
    const prefix = model.slice(0, slash);
    if (isProviderName(prefix)) {
      return { providerName: prefix, model: model.slice(slash + 1) };
    }
  }
  if (model === "mock" || model.startsWith("mock-")) return { providerName: "mock", model };
  if (model.startsWith("claude")) return { providerName: "anthropic", model };
  return { providerName: "openai", model };
}

/**
 * Lazily constructs one provider per backend. Construction errors (a
 * missing API key) surface on first use, not at startup.
 */
export class ProviderRegistry {
  private readonly instances = new Map<ProviderName, LLMProvider>();
  private readonly factories: ProviderFactories;

  constructor(factories: ProviderFactories = {}) {
    this.factories = factories;
  }

  resolve(model: string): ResolvedProvider {
    const route = routeModel(model);
    let provider = this.instances.get(route.providerName);
    if (!provider) {
      const factory = this.factories[route.providerName];
      provider = factory ? factory() : createLLMProvider(route.providerName);
      this.instances.set(route.providerName, provider);
    }
    return { provider, model: route.model };
  }
}

function isProviderName(value: string): value is ProviderName {
  return (PROVIDER_NAMES as readonly string[]).includes(value);
}
