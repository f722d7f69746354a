import { z, ZodError } from "zod";
import { ConfigError } from "../core/errors/index.js";

const DEFAULT_MODEL = "gpt-4o-mini";

const boolish = z
  .union([z.boolean(), z.string()])
  .transform((value, ctx) => {
    if (typeof value === "boolean") return value;
    const normalized = value.trim().toLowerCase();
    if (["true", "1", "yes"].includes(normalized)) return true;
    if (["false", "0", "no"].includes(normalized)) return false;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean, got "${value}"` });
    return z.NEVER;
  });

const int = (min: number) => z.coerce.number().int().min(min);

/** "7,15,23" or an array of sizes; duplicates are dropped and the rest sorted. */
const sizeList = z.preprocess(
  (value) => (typeof value === "string" ? value.split(",").map((s) => s.trim()).filter(Boolean) : value),
  z.array(int(1)).transform((sizes) => [...new Set(sizes)].sort((a, b) => a - b)),
);

export const PipelineConfigSchema = z.object({
  numConstraints: int(1).default(39),
  /** Constraint-subset sizes for the expand stage; empty keeps the full list. */
  subsetSizes: sizeList.default([]),
  maxRetries: int(1).default(3),
  retryDelayMs: int(0).default(1000),
  callTimeoutMs: int(1).default(120_000),
  concurrency: int(1).default(4),
  temperature: z.coerce.number().min(0).max(2).default(0.7),
  maxTokens: int(1).default(4096),
  fitMaxPasses: int(1).default(2),
  fitSelfCheck: boolish.default(true),
  fitOnBudget: z.enum(["accept", "fail"]).default("accept"),
  evalMode: z.enum(["batch", "per-constraint"]).default("batch"),
  judgementRetries: int(0).default(2),
  models: z.object({
    constraints: z.string().min(1).default(DEFAULT_MODEL),
    base: z.string().min(1).default(DEFAULT_MODEL),
    fitting: z.string().min(1).default(DEFAULT_MODEL),
    evaluation: z.string().min(1).default(DEFAULT_MODEL),
  }).default({}),
}).superRefine((config, ctx) => {
  const tooLarge = config.subsetSizes.filter((size) => size > config.numConstraints);
  if (tooLarge.length > 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["subsetSizes"],
      message: `sizes ${tooLarge.join(", ")} exceed numConstraints (${config.numConstraints})`,
    });
  }
});
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

/** Environment variable → config key. Unset or empty variables fall back to defaults. */
const ENV_KEYS = {
  NUM_CONSTRAINTS: "numConstraints",
  SUBSET_SIZES: "subsetSizes",
  MAX_RETRIES: "maxRetries",
  RETRY_DELAY_MS: "retryDelayMs",
  CALL_TIMEOUT_MS: "callTimeoutMs",
  CONCURRENCY: "concurrency",
  TEMPERATURE: "temperature",
  MAX_TOKENS: "maxTokens",
  FIT_MAX_PASSES: "fitMaxPasses",
  FIT_SELF_CHECK: "fitSelfCheck",
  FIT_ON_BUDGET: "fitOnBudget",
  EVAL_MODE: "evalMode",
  JUDGEMENT_RETRIES: "judgementRetries",
} as const;

const MODEL_ENV_KEYS = {
  CONSTRAINT_MODEL: "constraints",
  BASE_MODEL: "base",
  FITTING_MODEL: "fitting",
  EVALUATION_MODEL: "evaluation",
} as const;

/**
 * Build the pipeline configuration from environment variables.
 * The returned object is frozen: no core component mutates configuration.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<PipelineConfig> {
  const raw: Record<string, unknown> = {};
  for (const [envKey, configKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey];
    if (value !== undefined && value !== "") raw[configKey] = value;
  }

  const models: Record<string, string> = {};
  for (const [envKey, stage] of Object.entries(MODEL_ENV_KEYS)) {
    const value = env[envKey];
    if (value !== undefined && value !== "") models[stage] = value;
  }
  raw["models"] = models;

  return parseConfig(raw);
}

/** Validate a partial config object (tests and programmatic callers). */
export function parseConfig(input: unknown): Readonly<PipelineConfig> {
  try {
    return Object.freeze(PipelineConfigSchema.parse(input));
  } catch (error) {
    if (error instanceof ZodError) {
      const details = error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ");
      throw new ConfigError(`Invalid configuration: ${details}`, { cause: error });
    }
    throw error;
  }
}
