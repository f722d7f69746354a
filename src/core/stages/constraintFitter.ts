import { CallError, EvaluationError, FittingError } from "../errors/index.js";
import { createLogger } from "../logging/index.js";
import type { LLMGateway } from "../gateway/index.js";
import { fittingPrompt } from "../prompts/index.js";
import type { Constraint, Domain, EvaluationVerdict } from "../schemas/index.js";
import type { GenerationParams } from "../../providers/llm-provider.js";
import type { EvaluationResult, Evaluator } from "./evaluator.js";

const logger = createLogger("constraint-fitter");

export type BudgetPolicy = "accept" | "fail";

export interface FitterConfig {
  model: string;
  /** Revision passes allowed per record (default 2). */
  maxPasses?: number;
  /** Evaluator used to score each draft; omit to revise blindly. */
  selfCheck?: Evaluator;
  /** What to do when the budget is spent short of full satisfaction. */
  onBudget?: BudgetPolicy;
  params?: GenerationParams;
}

export interface FitInput {
  task: string;
  base: string;
  constraints: readonly Constraint[];
  domain?: Domain;
}

export interface FitResult {
  content: string;
  passes: number;
  satisfactionRate?: number;
  verdicts?: EvaluationVerdict[];
}

/** Best-scoring draft so far; `score` is absent until a self-check ran. */
interface Draft {
  content: string;
  score?: EvaluationResult;
}

type FitState =
  | { phase: "revise"; draft: Draft; passes: number }
  | { phase: "selfCheck"; evaluator: Evaluator; draft: Draft; candidate: string; passes: number }
  | { phase: "accepted"; result: FitResult };

/**
 * Constraint Fitting Engine
 *
 *   draft → revise → selfCheck → (revise | accepted | failed)
 *
 * Every transition is bounded by `maxPasses`. With self-check on, the
 * base is scored before the first revision and the accepted content is
 * the best-scoring draft seen, base included. A base that already
 * satisfies every constraint comes back unchanged with zero passes.
 */
export class ConstraintFitter {
  private readonly model: string;
  private readonly maxPasses: number;
  private readonly selfCheck?: Evaluator;
  private readonly onBudget: BudgetPolicy;
  private readonly params: GenerationParams;

  constructor(
    private readonly gateway: LLMGateway,
    config: FitterConfig,
  ) {
    this.model = config.model;
    this.maxPasses = Math.max(1, config.maxPasses ?? 2);
    this.selfCheck = config.selfCheck;
    this.onBudget = config.onBudget ?? "accept";
    this.params = config.params ?? {};
  }

  async fit(input: FitInput): Promise<FitResult> {
    if (input.constraints.length === 0) {
      return { content: input.base, passes: 0, satisfactionRate: 1, verdicts: [] };
    }

    let state: FitState = this.initialState(input);

    while (state.phase !== "accepted") {
      switch (state.phase) {
        case "revise": {
          const candidate: string = await this.revise(input, state.draft, state.passes);
          const passes: number = state.passes + 1;
          logger.debug({ passes, length: candidate.length }, "Revision pass complete");
          state = this.selfCheck
            ? { phase: "selfCheck", evaluator: this.selfCheck, draft: state.draft, candidate, passes }
            : this.afterBlindPass(candidate, passes);
          break;
        }
        case "selfCheck":
          state = await this.check(input, state.evaluator, state.draft, state.candidate, state.passes);
          break;
      }
    }

    return state.result;
  }

  /** A non-empty base is scored first, so no revision can rank below it. */
  private initialState(input: FitInput): FitState {
    const draft: Draft = { content: input.base };
    if (this.selfCheck && input.base.trim()) {
      return { phase: "selfCheck", evaluator: this.selfCheck, draft, candidate: input.base, passes: 0 };
    }
    return { phase: "revise", draft, passes: 0 };
  }

  private afterBlindPass(candidate: string, passes: number): FitState {
    if (passes >= this.maxPasses) {
      return { phase: "accepted", result: { content: candidate, passes } };
    }
    return { phase: "revise", draft: { content: candidate }, passes };
  }

  private async check(
    input: FitInput,
    evaluator: Evaluator,
    best: Draft,
    candidate: string,
    passes: number,
  ): Promise<FitState> {
    const score = await this.score(evaluator, input, candidate, passes);

    // Keep the candidate unless an earlier draft scored strictly higher.
    const previous = best.score?.satisfactionRate ?? -1;
    const draft: Draft = score.satisfactionRate >= previous ? { content: candidate, score } : best;
    const rate = draft.score?.satisfactionRate ?? score.satisfactionRate;

    if (rate === 1) {
      return { phase: "accepted", result: toResult(draft, passes) };
    }

    if (passes < this.maxPasses) {
      logger.info({ passes, satisfactionRate: rate }, "Draft short of full satisfaction; revising");
      return { phase: "revise", draft, passes };
    }

    if (this.onBudget === "fail") {
      throw new FittingError(
        "budgetExceeded",
        `Pass budget of ${this.maxPasses} spent at satisfaction rate ${rate.toFixed(3)}`,
        { passes },
      );
    }

    logger.info({ passes, satisfactionRate: rate }, "Pass budget spent; accepting best draft");
    return { phase: "accepted", result: toResult(draft, passes) };
  }

  private async revise(input: FitInput, draft: Draft, passes: number): Promise<string> {
    const failing = new Set(draft.score?.verdicts.filter((v) => !v.satisfied).map((v) => v.index));
    const unsatisfied = input.constraints.filter((c) => failing.has(c.index));
    const spec = fittingPrompt({
      domain: input.domain ?? "blog",
      task: input.task,
      draft: draft.content,
      constraints: input.constraints,
      unsatisfied,
    });

    let text: string;
    try {
      text = await this.gateway.invoke(spec.prompt, this.model, { ...this.params, system: spec.system });
    } catch (error) {
      if (error instanceof CallError) {
        throw new FittingError("generationFailed", `Revision pass ${passes + 1} failed: ${error.message}`, {
          passes,
          cause: error,
        });
      }
      throw error;
    }

    const content = text.trim();
    if (!content) {
      throw new FittingError("generationFailed", `Revision pass ${passes + 1} returned blank text`, { passes });
    }
    return content;
  }

  private async score(
    evaluator: Evaluator,
    input: FitInput,
    candidate: string,
    passes: number,
  ): Promise<EvaluationResult> {
    try {
      return await evaluator.evaluate(candidate, input.constraints, input.domain);
    } catch (error) {
      if (error instanceof EvaluationError) {
        const when = passes === 0 ? "of the base" : `after pass ${passes}`;
        throw new FittingError("generationFailed", `Self-check ${when} failed: ${error.message}`, {
          passes,
          cause: error,
        });
      }
      throw error;
    }
  }
}

function toResult(draft: Draft, passes: number): FitResult {
  return {
    content: draft.content,
    passes,
    satisfactionRate: draft.score?.satisfactionRate,
    verdicts: draft.score?.verdicts,
  };
}
