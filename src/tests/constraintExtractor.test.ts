import { describe, it, expect } from "vitest";
import { SchemaError } from "../core/errors/index.js";
import { LLMGateway } from "../core/gateway/index.js";
import { ConstraintExtractor, parseExtraction } from "../core/stages/constraintExtractor.js";
import { UsageTracker } from "../core/usage/index.js";
import { MockLLM } from "../providers/mock-llm.js";
import type { LLMProvider } from "../providers/llm-provider.js";
import { ScriptedLLM, numberedList, registryWith } from "./helpers/scriptedLLM.js";

function setup(provider: LLMProvider, numConstraints: number) {
  const gateway = new LLMGateway({
    usage: new UsageTracker(),
    providers: registryWith(provider),
    maxRetries: 1,
    timeoutMs: 0,
  });
  return new ConstraintExtractor(gateway, { model: "mock", numConstraints });
}

function reply(task: string, count: number): string {
  return `Main Task: ${task}\n\nConstraints:\n${numberedList(count)}`;
}

describe("parseExtraction", () => {
  it("should split the task line from the constraint list", () => {
    const parsed = parseExtraction("Main Task: Write about tides.\n\nConstraints:\n1. Mention the moon\n2. Use one analogy");
    expect(parsed.taskDescription).toBe("Write about tides.");
    expect(parsed.constraintText.trim()).toBe("1. Mention the moon\n2. Use one analogy");
  });

  it("should tolerate bold headings", () => {
    const parsed = parseExtraction("**Main Task:** Describe a market.\n\n**Constraints:**\n1. Name a stall");
    expect(parsed.taskDescription).toBe("Describe a market.");
    expect(parsed.constraintText.trim()).toBe("1. Name a stall");
  });

  it("should reject a reply without a task", () => {
    expect(() => parseExtraction("Constraints:\n1. Something")).toThrow(SchemaError);
  });
});

describe("ConstraintExtractor", () => {
  it("should extract exactly the configured number of constraints", async () => {
    const extractor = setup(new MockLLM(), 39);

    const extraction = await extractor.extract("A post about autumn walks.", "blog");

    expect(extraction.taskDescription).toBe("Write a piece that covers the main points of the input.");
    expect(extraction.constraints).toHaveLength(39);
    expect(extraction.constraints[38]?.index).toBe(39);
  });

  it("should ask again when the count is wrong", async () => {
    const provider = new ScriptedLLM((_req, call) => reply("Write a recipe.", call === 1 ? 3 : 4));
    const extractor = setup(provider, 4);

    const extraction = await extractor.extract("Recipe text");

    expect(provider.requests).toHaveLength(2);
    expect(extraction.constraints).toHaveLength(4);
  });

  it("should fail with WrongCount when every reply has the wrong count", async () => {
    const provider = new ScriptedLLM(() => reply("Write a recipe.", 5));
    const extractor = setup(provider, 4);

    const error = await extractor.extract("Recipe text").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SchemaError);
    expect(error).toMatchObject({ kind: "wrongCount", expected: 4, actual: 5 });
    expect(provider.requests).toHaveLength(2);
  });

  it("should put the sample content and count into the request", async () => {
    const provider = new ScriptedLLM(() => reply("Summarise the story.", 2));
    const extractor = setup(provider, 2);

    await extractor.extract("Once upon a time.", "story");

    const request = provider.requests[0];
    expect(request?.prompt).toBe("Input - Once upon a time.\nOutput -");
    expect(request?.system).toContain("exactly 2 atomic constraints");
  });
});
