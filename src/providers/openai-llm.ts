import OpenAI from "openai";
import type { GenerationRequest, GenerationResult, LLMProvider } from "./llm-provider.js";
import { ProviderError, toProviderError } from "./provider-error.js";

/**
 * OpenAI provider – Chat Completions API.
 *
 * Reads OPENAI_API_KEY from environment unless a key is passed in.
 * SDK-level retries are disabled; the gateway owns the retry policy.
 */
export class OpenAILLM implements LLMProvider {
  readonly name = "openai";
  private client: OpenAI;

  constructor(options?: { apiKey?: string; baseURL?: string }) {
    const apiKey = options?.apiKey ?? process.env["OPENAI_API_KEY"];
    if (!apiKey) {
      throw new Error(
        "OPENAI_API_KEY is required. Set it in .env or pass via constructor."
      );
    }

    this.client = new OpenAI({ apiKey, baseURL: options?.baseURL, maxRetries: 0 });
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
    if (request.system) {
      messages.push({ role: "system", content: request.system });
    }
    messages.push({ role: "user", content: request.prompt });

    let response: OpenAI.Chat.ChatCompletion;
    try {
      response = await this.client.chat.completions.create(
        {
          model: request.model,
          messages,
          temperature: request.temperature,
          max_tokens: request.maxTokens,
        },
        { signal: request.signal },
      );
    } catch (error) {
      throw toProviderError(error, this.name);
    }

    const usage = {
      promptTokens: response.usage?.prompt_tokens ?? 0,
      completionTokens: response.usage?.completion_tokens ?? 0,
    };

    const content = response.choices[0]?.message?.content?.trim();
    if (!content) {
      throw new ProviderError("OpenAI returned an empty response", {
        provider: this.name,
        transient: true,
        usage,
      });
    }

    return { text: content, usage };
  }
}
