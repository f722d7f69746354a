import { validateConstraints } from "../constraints/index.js";
import { SchemaError } from "../errors/index.js";
import type { LLMGateway } from "../gateway/index.js";
import { createLogger } from "../logging/index.js";
import { extractionPrompt } from "../prompts/index.js";
import type { Constraint, Domain } from "../schemas/index.js";
import type { GenerationParams } from "../../providers/llm-provider.js";

const logger = createLogger("constraint-extractor");

const MAIN_TASK = /^\s*(?:\*\*)?main task(?:\*\*)?\s*:\s*(?:\*\*)?\s*(.*)$/im;
const CONSTRAINTS_HEADER = /^\s*(?:\*\*)?constraints(?:\*\*)?\s*:?\s*(?:\*\*)?\s*$/im;

export interface ExtractorConfig {
  model: string;
  numConstraints: number;
  /** Asks per record; a reply that fails validation is asked again (default 2). */
  maxAttempts?: number;
  params?: GenerationParams;
}

export interface Extraction {
  taskDescription: string;
  constraints: Constraint[];
}

/**
 * Split an extraction reply into its task line and constraint list.
 * The constraint text is returned raw; validation happens separately.
 */
export function parseExtraction(text: string): { taskDescription: string; constraintText: string } {
  const task = MAIN_TASK.exec(text);
  const taskDescription = (task?.[1] ?? "").trim();
  if (!taskDescription) {
    throw new SchemaError("malformedEntry", 'Extraction reply has no "Main Task:" line');
  }

  const header = CONSTRAINTS_HEADER.exec(text);
  if (header) {
    return { taskDescription, constraintText: text.slice(header.index + header[0].length) };
  }
  // No header: everything after the task line.
  const end = task ? task.index + task[0].length : 0;
  return { taskDescription, constraintText: text.slice(end) };
}

/**
 * Constraint Extractor
 * Derives a task description and exactly `numConstraints` atomic
 * constraints from sample content. Output is never truncated or padded:
 * a reply with the wrong count is asked again, then fails the record.
 */
export class ConstraintExtractor {
  private readonly model: string;
  private readonly numConstraints: number;
  private readonly maxAttempts: number;
  private readonly params: GenerationParams;

  constructor(
    private readonly gateway: LLMGateway,
    config: ExtractorConfig,
  ) {
    this.model = config.model;
    this.numConstraints = config.numConstraints;
    this.maxAttempts = Math.max(1, config.maxAttempts ?? 2);
    this.params = config.params ?? {};
  }

  async extract(content: string, domain: Domain = "blog"): Promise<Extraction> {
    const spec = extractionPrompt(domain, content, this.numConstraints);
    let lastError: SchemaError | undefined;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const reply = await this.gateway.invoke(spec.prompt, this.model, { ...this.params, system: spec.system });
      try {
        const { taskDescription, constraintText } = parseExtraction(reply);
        const constraints = validateConstraints(constraintText, this.numConstraints);
        return { taskDescription, constraints };
      } catch (error) {
        if (!(error instanceof SchemaError)) throw error;
        lastError = error;
        logger.warn({ attempt, maxAttempts: this.maxAttempts, kind: error.kind, error: error.message }, "Extraction reply rejected");
      }
    }

    throw lastError ?? new SchemaError("malformedEntry", "Extraction produced no reply");
  }
}
