import Anthropic from "@anthropic-ai/sdk";
import type { GenerationRequest, GenerationResult, LLMProvider } from "./llm-provider.js";
import { ProviderError, toProviderError } from "./provider-error.js";

const DEFAULT_MAX_TOKENS = 4096;

/**
 * Anthropic provider – Messages API.
 * Reads ANTHROPIC_API_KEY from environment unless a key is passed in.
 */
export class AnthropicLLM implements LLMProvider {
  readonly name = "anthropic";
  private client: Anthropic;

  constructor(options?: { apiKey?: string }) {
    const apiKey = options?.apiKey ?? process.env["ANTHROPIC_API_KEY"];
    if (!apiKey) {
      throw new Error(
        "ANTHROPIC_API_KEY is required. Set it in .env or pass via constructor."
      );
    }

    this.client = new Anthropic({ apiKey, maxRetries: 0 });
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create(
        {
          model: request.model,
          max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
          temperature: request.temperature,
          system: request.system,
          messages: [{ role: "user", content: request.prompt }],
        },
        { signal: request.signal },
      );
    } catch (error) {
      throw toProviderError(error, this.name);
    }

    const usage = {
      promptTokens: response.usage.input_tokens,
      completionTokens: response.usage.output_tokens,
    };

    const parts: string[] = [];
    for (const block of response.content) {
      if (block.type === "text") parts.push(block.text);
    }
    const text = parts.join("").trim();
    if (!text) {
      throw new ProviderError("Anthropic returned an empty response", {
        provider: this.name,
        transient: true,
        usage,
      });
    }

    return { text, usage };
  }
}
