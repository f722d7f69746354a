import type { GenerationRequest, GenerationResult, LLMProvider } from "./llm-provider.js";

const NUMBERED_LINE = /^(\d+)\.\s+(.*)$/;

/**
 * MockLLM – a deterministic provider for development without API keys.
 *
 * It inspects the system prompt to tell which stage is calling and returns
 * a well-formed reply so the pipeline can run end-to-end:
 *   - extraction → "Main Task:" plus the requested number of constraints
 *   - judgement  → "<n>. Yes - …" for every listed constraint
 *   - otherwise  → text that restates the task and each listed constraint
 */
export class MockLLM implements LLMProvider {
  readonly name = "mock";

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const system = request.system ?? "";
    let text: string;

    if (system.includes("Main Task:")) {
      text = this.extraction(system);
    } else if (system.includes("Answer Yes or No")) {
      text = listedConstraints(request.prompt)
        .map((c) => `${c.index}. Yes - The text addresses "${c.text}".`)
        .join("\n");
    } else {
      text = this.composition(request.prompt);
    }

    return {
      text,
      usage: { promptTokens: estimateTokens(system + request.prompt), completionTokens: estimateTokens(text) },
    };
  }

  private extraction(system: string): string {
    const count = Number(/exactly (\d+) atomic constraints/.exec(system)?.[1] ?? "0");
    const lines = ["Main Task: Write a piece that covers the main points of the input.", "", "Constraints:"];
    for (let i = 1; i <= count; i++) {
      lines.push(`${i}. The piece should develop point ${i} of the input.`);
    }
    return lines.join("\n");
  }

  private composition(prompt: string): string {
    const task = /^Task: (.*)$/m.exec(prompt)?.[1] ?? "Untitled";
    const paragraphs = [`[${this.name}] ${task}`];
    for (const c of listedConstraints(prompt)) {
      paragraphs.push(`This part follows the instruction: ${c.text}`);
    }
    return paragraphs.join("\n\n");
  }
}

/** Numbered lines of the first "Constraints:" block in a prompt. */
function listedConstraints(prompt: string): Array<{ index: number; text: string }> {
  const start = prompt.indexOf("Constraints:\n");
  if (start < 0) return [];
  const result: Array<{ index: number; text: string }> = [];
  for (const line of prompt.slice(start + "Constraints:\n".length).split("\n")) {
    const match = NUMBERED_LINE.exec(line.trim());
    if (!match) break;
    result.push({ index: Number(match[1]), text: match[2] ?? "" });
  }
  return result;
}

function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}
