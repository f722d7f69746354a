import type { Constraint, Domain } from "../schemas/index.js";
import { formatConstraints } from "../constraints/index.js";

/** A system instruction plus the user prompt sent through the gateway. */
export interface PromptSpec {
  system: string;
  prompt: string;
}

// ── Constraint extraction ─────────────────────────────────────────────

export function extractionPrompt(domain: Domain, content: string, numConstraints: number): PromptSpec {
  const system = `You are a writing expert. You will be given a ${domain} that a language model wrote.

1. Identify the main task of the ${domain} in one sentence, phrased as an instruction.
2. Write exactly ${numConstraints} atomic constraints that could have been given to the model to produce it.
   - Each constraint is a single, independently checkable requirement.
   - Do not repeat constraints and avoid proper nouns.
   - Constraints concern content, structure or reasoning; use stylistic constraints only to reach the count.
   - Scramble the order so the list does not follow the ${domain} from start to end.
   - You may prefix a constraint with one tag: [content], [structure], [reasoning] or [style].

Reply in exactly this format:
Main Task: <instruction>

Constraints:
1. <constraint>
2. <constraint>`;

  return { system, prompt: `Input - ${content}\nOutput -` };
}

// ── Base generation ───────────────────────────────────────────────────

export function baseGenerationPrompt(domain: Domain, task: string): PromptSpec {
  const system = `You are a creative writing expert. Write ${domain} content that fulfills the task.
The content should be well-structured, coherent and natural in tone, around 400 words.
Output only the ${domain}.`;

  return { system, prompt: `Task: ${task}` };
}

// ── Constraint fitting ────────────────────────────────────────────────

export function fittingPrompt(input: {
  domain: Domain;
  task: string;
  draft: string;
  constraints: readonly Constraint[];
  unsatisfied: readonly Constraint[];
}): PromptSpec {
  const { domain, task, draft, constraints, unsatisfied } = input;

  const system = `You are a creative writing expert. Revise the ${domain} so that it satisfies every listed constraint
while keeping it coherent, natural and complete. Keep the core ideas of the current draft.
Do not mention the constraints explicitly. Output only the revised ${domain}.`;

  const sections = [
    `Task: ${task}`,
    draft
      ? `Current draft:\n${draft}`
      : `Current draft:\n(none – write the ${domain} from the task description)`,
    `Constraints:\n${formatConstraints(constraints)}`,
  ];
  if (unsatisfied.length > 0) {
    sections.push(`Constraints the current draft does not yet satisfy:\n${formatConstraints(unsatisfied)}`);
  }
  sections.push(`Write the revised ${domain}:`);

  return { system, prompt: sections.join("\n\n") };
}

// ── Evaluation ────────────────────────────────────────────────────────

const JUDGE_SYSTEM = `You are a strict expert reader. Decide for each constraint whether the text satisfies it completely.
Answer Yes or No per constraint; partial satisfaction is No.
Reply with one line per constraint in the form:
<number>. Yes - <the sentence that satisfies it>
<number>. No - <how it is violated>`;

export function batchJudgementPrompt(domain: Domain, content: string, constraints: readonly Constraint[]): PromptSpec {
  const label = capitalize(domain);
  return {
    system: JUDGE_SYSTEM,
    prompt: `${label}:\n${content}\n\nConstraints:\n${formatConstraints(constraints)}`,
  };
}

export function singleJudgementPrompt(domain: Domain, content: string, constraint: Constraint): PromptSpec {
  const label = capitalize(domain);
  return {
    system: JUDGE_SYSTEM,
    prompt: `${label}:\n${content}\n\nConstraints:\n${formatConstraints([constraint])}`,
  };
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}
