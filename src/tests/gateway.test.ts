import { describe, it, expect, vi } from "vitest";
import { LLMGateway } from "../core/gateway/index.js";
import { CallError } from "../core/errors/index.js";
import { UsageTracker } from "../core/usage/index.js";
import { ProviderRegistry } from "../providers/index.js";
import { ProviderError } from "../providers/provider-error.js";
import { ScriptedLLM, registryWith, type Script } from "./helpers/scriptedLLM.js";

function transient(message = "upstream overloaded"): ProviderError {
  return new ProviderError(message, { provider: "mock", transient: true, status: 503 });
}

interface SetupOptions {
  maxRetries?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
}

function setup(script: Script, overrides: SetupOptions = {}) {
  const provider = new ScriptedLLM(script);
  const usage = new UsageTracker();
  const sleep = vi.fn(async (_ms: number) => {});
  const gateway = new LLMGateway({
    usage,
    providers: registryWith(provider),
    maxRetries: overrides.maxRetries ?? 3,
    retryDelayMs: overrides.retryDelayMs ?? 100,
    timeoutMs: overrides.timeoutMs ?? 0,
    sleep,
  });
  return { provider, usage, sleep, gateway };
}

describe("LLMGateway", () => {
  it("should return the provider text and record usage", async () => {
    const { gateway, usage, provider } = setup(() => "hello");

    const text = await gateway.invoke("Say hello", "mock");

    expect(text).toBe("hello");
    expect(provider.requests).toHaveLength(1);
    const snapshot = usage.snapshot();
    expect(snapshot.calls).toBe(1);
    expect(snapshot.failedCalls).toBe(0);
    expect(snapshot.promptTokens).toBe(10);
    expect(snapshot.completionTokens).toBe(5);
    expect(snapshot.totalTokens).toBe(15);
  });

  it("should retry transient failures with exponential backoff", async () => {
    const { gateway, usage, sleep } = setup((_req, call) => (call < 3 ? transient() : "finally"));

    const result = await gateway.invokeDetailed("prompt", "mock");

    expect(result.text).toBe("finally");
    expect(result.attempts).toBe(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
    expect(usage.snapshot().calls).toBe(3);
    expect(usage.snapshot().failedCalls).toBe(2);
  });

  it("should make exactly MAX_RETRIES attempts before giving up", async () => {
    const { gateway, provider, sleep } = setup(() => transient(), { maxRetries: 3 });

    const error = await gateway.invoke("prompt", "mock").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CallError);
    expect(error).toMatchObject({ kind: "exhausted", attempts: 3 });
    expect(provider.requests).toHaveLength(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it("should carry the last cause on exhaustion", async () => {
    const { gateway } = setup((_req, call) => transient(`fault ${call}`), { maxRetries: 2 });

    const error = await gateway.invoke("prompt", "mock").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CallError);
    if (!(error instanceof CallError)) return;
    expect(error.lastCause).toBeInstanceOf(ProviderError);
    expect(error.message).toContain("fault 2");
  });

  it("should not retry non-transient failures", async () => {
    const unauthorized = Object.assign(new Error("Incorrect API key"), { status: 401 });
    const { gateway, provider, sleep, usage } = setup(() => unauthorized);

    const error = await gateway.invoke("prompt", "mock").catch((e: unknown) => e);

    expect(error).toMatchObject({ kind: "invalid", attempts: 1 });
    expect(provider.requests).toHaveLength(1);
    expect(sleep).not.toHaveBeenCalled();
    expect(usage.snapshot().failedCalls).toBe(1);
  });

  it("should reject an empty prompt without calling the provider", async () => {
    const { gateway, provider, usage } = setup(() => "unused");

    await expect(gateway.invoke("   ", "mock")).rejects.toMatchObject({ kind: "invalid", attempts: 0 });
    expect(provider.requests).toHaveLength(0);
    expect(usage.snapshot().calls).toBe(0);
  });

  it("should fail as invalid when the provider cannot be constructed", async () => {
    const gateway = new LLMGateway({
      usage: new UsageTracker(),
      providers: new ProviderRegistry({
        openai: () => {
          throw new Error("OPENAI_API_KEY is required");
        },
      }),
    });

    const error = await gateway.invoke("prompt", "gpt-4o-mini").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CallError);
    expect(error).toMatchObject({ kind: "invalid", attempts: 0 });
    if (error instanceof CallError) {
      expect(error.message).toContain("OPENAI_API_KEY is required");
    }
  });

  it("should record tokens a failed attempt reported", async () => {
    const partial = new ProviderError("empty completion", {
      provider: "mock",
      transient: true,
      usage: { promptTokens: 7, completionTokens: 0 },
    });
    const { gateway, usage } = setup(() => partial, { maxRetries: 1 });

    await expect(gateway.invoke("prompt", "mock")).rejects.toBeInstanceOf(CallError);
    expect(usage.snapshot()).toMatchObject({ calls: 1, failedCalls: 1, promptTokens: 7, completionTokens: 0 });
  });

  it("should abort and retry attempts that exceed the timeout", async () => {
    const { gateway, provider } = setup(() => new Promise<string>(() => {}), { maxRetries: 2, timeoutMs: 20 });

    const error = await gateway.invoke("prompt", "mock").catch((e: unknown) => e);

    expect(error).toMatchObject({ kind: "exhausted", attempts: 2 });
    expect(provider.requests).toHaveLength(2);
    expect(provider.requests.every((r) => r.signal?.aborted === true)).toBe(true);
  });

  it("should merge default params under call params and strip the provider prefix", async () => {
    const provider = new ScriptedLLM(() => "ok");
    const gateway = new LLMGateway({
      usage: new UsageTracker(),
      providers: registryWith(provider),
      timeoutMs: 0,
      defaults: { temperature: 0.2, maxTokens: 100 },
    });

    await gateway.invoke("prompt", "mock/offline-1", { maxTokens: 50, system: "be brief" });

    expect(provider.requests[0]).toMatchObject({
      prompt: "prompt",
      model: "offline-1",
      temperature: 0.2,
      maxTokens: 50,
      system: "be brief",
    });
  });

  it("should count every concurrent call", async () => {
    const { gateway, usage } = setup(async () => {
      await new Promise((resolve) => setTimeout(resolve, 1));
      return "ok";
    });

    await Promise.all(Array.from({ length: 25 }, (_, i) => gateway.invoke(`prompt ${i}`, "mock")));

    expect(usage.snapshot().calls).toBe(25);
    expect(usage.snapshot().promptTokens).toBe(250);
  });
});
