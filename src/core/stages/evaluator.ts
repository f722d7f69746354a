import { CallError, EvaluationError } from "../errors/index.js";
import { createLogger } from "../logging/index.js";
import type { LLMGateway } from "../gateway/index.js";
import { batchJudgementPrompt, singleJudgementPrompt, type PromptSpec } from "../prompts/index.js";
import type { Constraint, Domain, EvaluationVerdict } from "../schemas/index.js";
import type { GenerationParams } from "../../providers/llm-provider.js";

const logger = createLogger("evaluator");

const JUDGEMENT_LINE = /^\s*(?:\*\*)?(\d+)[.)]\s*(?:\*\*)?\s*(yes|no)\b\**\s*[-–—:,.]?\s*(.*)$/i;
const BARE_JUDGEMENT = /^\s*(?:\*\*)?(yes|no)\b\**\s*[-–—:,.]?\s*(.*)$/i;

export type EvaluationMode = "batch" | "per-constraint";

export interface EvaluatorConfig {
  model: string;
  /** "batch" judges all constraints in one call; missing ones are re-judged singly. */
  mode?: EvaluationMode;
  /** Extra asks when a single judgement reply cannot be parsed (default 2). */
  judgementRetries?: number;
  params?: GenerationParams;
}

export interface EvaluationResult {
  verdicts: EvaluationVerdict[];
  satisfactionRate: number;
}

type Judgement = Pick<EvaluationVerdict, "satisfied" | "explanation">;

/**
 * Fraction of constraints judged satisfied. Always derived from the verdict
 * list; an empty constraint list is vacuously fully satisfied.
 */
export function satisfactionRate(verdicts: readonly EvaluationVerdict[], total: number): number {
  if (total === 0) return 1;
  return verdicts.filter((v) => v.satisfied).length / total;
}

/**
 * Parse "<n>. Yes|No - explanation" lines. Later duplicates of an index are
 * ignored; a trailing "Number of constraints satisfied" line is not read,
 * the count is always recomputed from the verdicts.
 */
export function parseJudgements(text: string): Map<number, Judgement> {
  const judgements = new Map<number, Judgement>();
  for (const line of text.split(/\r?\n/)) {
    const match = JUDGEMENT_LINE.exec(line);
    if (!match) continue;
    const index = Number(match[1]);
    if (judgements.has(index)) continue;
    judgements.set(index, {
      satisfied: (match[2] ?? "").toLowerCase() === "yes",
      explanation: (match[3] ?? "").trim(),
    });
  }
  return judgements;
}

/** Parse a reply judging one constraint, numbered or not. */
export function parseSingleJudgement(text: string, index: number): Judgement | null {
  const numbered = parseJudgements(text).get(index);
  if (numbered) return numbered;
  for (const line of text.split(/\r?\n/)) {
    const match = BARE_JUDGEMENT.exec(line);
    if (match) {
      return { satisfied: (match[1] ?? "").toLowerCase() === "yes", explanation: (match[2] ?? "").trim() };
    }
  }
  return null;
}

/**
 * Evaluation Engine
 * Judges content against each constraint and derives the satisfaction rate.
 * Verdicts follow constraint order. A verdict that cannot be obtained fails
 * the whole evaluation; nothing defaults to "unsatisfied".
 */
export class Evaluator {
  private readonly model: string;
  private readonly mode: EvaluationMode;
  private readonly judgementRetries: number;
  private readonly params: GenerationParams;

  constructor(
    private readonly gateway: LLMGateway,
    config: EvaluatorConfig,
  ) {
    this.model = config.model;
    this.mode = config.mode ?? "batch";
    this.judgementRetries = config.judgementRetries ?? 2;
    this.params = config.params ?? {};
  }

  async evaluate(content: string, constraints: readonly Constraint[], domain: Domain = "blog"): Promise<EvaluationResult> {
    if (constraints.length === 0) {
      return { verdicts: [], satisfactionRate: satisfactionRate([], 0) };
    }

    const judged = this.mode === "batch"
      ? await this.judgeBatch(content, constraints, domain)
      : new Map<number, Judgement>();

    const missing = constraints.filter((c) => !judged.has(c.index));
    if (this.mode === "batch" && missing.length > 0) {
      logger.warn({ missing: missing.map((c) => c.index) }, "Batch reply incomplete; judging remaining constraints singly");
    }

    const verdicts: EvaluationVerdict[] = [];
    for (const constraint of constraints) {
      const judgement = judged.get(constraint.index) ?? (await this.judgeOne(content, constraint, domain));
      verdicts.push({ index: constraint.index, ...judgement });
    }

    const rate = satisfactionRate(verdicts, constraints.length);
    logger.debug({ constraints: constraints.length, satisfactionRate: rate }, "Evaluation complete");
    return { verdicts, satisfactionRate: rate };
  }

  private async judgeBatch(
    content: string,
    constraints: readonly Constraint[],
    domain: Domain,
  ): Promise<Map<number, Judgement>> {
    const first = constraints[0]?.index ?? 1;
    const reply = await this.call(batchJudgementPrompt(domain, content, constraints), first);
    const wanted = new Set(constraints.map((c) => c.index));
    const judged = new Map<number, Judgement>();
    for (const [index, judgement] of parseJudgements(reply)) {
      if (wanted.has(index)) judged.set(index, judgement);
    }
    return judged;
  }

  private async judgeOne(content: string, constraint: Constraint, domain: Domain): Promise<Judgement> {
    const prompt = singleJudgementPrompt(domain, content, constraint);
    for (let ask = 0; ask <= this.judgementRetries; ask++) {
      const reply = await this.call(prompt, constraint.index);
      const judgement = parseSingleJudgement(reply, constraint.index);
      if (judgement) return judgement;
      logger.warn({ constraint: constraint.index, ask: ask + 1 }, "Unparseable judgement reply");
    }
    throw new EvaluationError(
      constraint.index,
      `No usable judgement for constraint ${constraint.index} after ${this.judgementRetries + 1} asks`,
    );
  }

  private async call(spec: PromptSpec, constraintIndex: number): Promise<string> {
    try {
      return await this.gateway.invoke(spec.prompt, this.model, { ...this.params, system: spec.system });
    } catch (error) {
      if (error instanceof CallError) {
        throw new EvaluationError(
          constraintIndex,
          `Judgement for constraint ${constraintIndex} unavailable: ${error.message}`,
          { cause: error },
        );
      }
      throw error;
    }
  }
}
