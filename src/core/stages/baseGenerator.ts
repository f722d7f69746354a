import type { LLMGateway } from "../gateway/index.js";
import { createLogger } from "../logging/index.js";
import { baseGenerationPrompt } from "../prompts/index.js";
import type { Domain } from "../schemas/index.js";
import type { GenerationParams } from "../../providers/llm-provider.js";

const logger = createLogger("base-generator");

/**
 * Base Generator
 * Writes unconstrained content from the task description alone. The result
 * is the starting draft for fitting; an empty reply is kept as an empty base.
 */
export class BaseGenerator {
  constructor(
    private readonly gateway: LLMGateway,
    private readonly model: string,
    private readonly params: GenerationParams = {},
  ) {}

  async generate(task: string, domain: Domain = "blog"): Promise<string> {
    const spec = baseGenerationPrompt(domain, task);
    const text = await this.gateway.invoke(spec.prompt, this.model, { ...this.params, system: spec.system });
    const content = text.trim();
    if (!content) {
      logger.warn({ domain }, "Base generation returned blank text");
    }
    return content;
  }
}
