import { v4 as uuidv4 } from "uuid";
import { ZodError, type z } from "zod";
import type { PipelineConfig } from "../../config/index.js";
import { describeError, PipelineError } from "../errors/index.js";
import { LLMGateway } from "../gateway/index.js";
import { createLogger } from "../logging/index.js";
import {
  BaseRecordSchema,
  BaseTableSchema,
  ConstrainedRecordSchema,
  ConstraintsTableSchema,
  EvaluatedRecordSchema,
  EvaluatedTableSchema,
  ExpandedTableSchema,
  FittedRecordSchema,
  FittedTableSchema,
  SourceTableSchema,
  TableNameSchema,
  type AnyTable,
  type EvaluatedTable,
  type ExpandedRecord,
  type RecordFailure,
  type RecordIdentity,
  type TableName,
  type TableRow,
} from "../schemas/index.js";
import { BaseGenerator } from "../stages/baseGenerator.js";
import { expandRecord } from "../stages/constraintExpander.js";
import { ConstraintExtractor } from "../stages/constraintExtractor.js";
import { ConstraintFitter } from "../stages/constraintFitter.js";
import { Evaluator } from "../stages/evaluator.js";
import { ingestCsv, type IngestResult } from "../storage/ingest.js";
import { formatIssues, type TableStore } from "../storage/tableStore.js";
import { UsageTracker, type UsageSnapshot } from "../usage/index.js";
import type { ProviderRegistry } from "../../providers/index.js";
import { createConcurrencyLimiter, type Limiter } from "./concurrency.js";

const logger = createLogger("pipeline");

export const STAGES = ["constraints", "base", "expand", "fit", "evaluate"] as const;
export type StageName = (typeof STAGES)[number];

/** Table each stage writes. */
export const STAGE_TABLES: Readonly<Record<StageName, TableName>> = {
  constraints: "constraints",
  base: "base",
  expand: "expanded",
  fit: "fitted",
  evaluate: "evaluated",
};

export interface PipelineDriverConfig {
  config: Readonly<PipelineConfig>;
  store: TableStore;
  /** Shared usage tracker; one is created when omitted. */
  usage?: UsageTracker;
  providers?: ProviderRegistry;
  runId?: string;
}

export interface StageReport {
  stage: StageName;
  table: TableName;
  total: number;
  succeeded: number;
  failed: number;
  skipped: boolean;
}

export interface RecordFailureSummary extends RecordFailure {
  id: string;
}

export interface SubsetSummary {
  subsetSize: number;
  records: number;
  meanSatisfactionRate: number;
}

export interface RunSummary {
  total: number;
  succeeded: number;
  failed: number;
  /** Mean over succeeded records only; null when none succeeded. */
  meanSatisfactionRate: number | null;
  /** Succeeded records grouped by constraint-subset size, smallest first. */
  bySubsetSize: SubsetSummary[];
  failures: RecordFailureSummary[];
}

export interface RunReport {
  runId: string;
  stages: StageReport[];
  summary: RunSummary;
  usage: UsageSnapshot;
}

export interface RunOptions {
  from?: StageName;
  /** Rerun stages whose tables already exist. */
  force?: boolean;
}

/**
 * Pipeline Driver
 * Runs the stages over a batch of records:
 *   constraints → base → expand → fit → evaluate
 *
 * `expand` makes no model calls: it copies each record once per configured
 * constraint-subset size.
 *
 * Each stage reads the previous stage's table from the store and writes
 * its own. Records run concurrently under the configured limit; a record
 * that fails becomes a failed row and is passed through untouched by
 * every later stage. Outputs are validated against their zod schema
 * before they are written.
 */
export class PipelineDriver {
  readonly runId: string;
  readonly usage: UsageTracker;
  private readonly config: Readonly<PipelineConfig>;
  private readonly store: TableStore;
  private readonly limit: Limiter;
  private readonly extractor: ConstraintExtractor;
  private readonly baseGenerator: BaseGenerator;
  private readonly fitter: ConstraintFitter;
  private readonly evaluator: Evaluator;

  constructor(options: PipelineDriverConfig) {
    const { config } = options;
    this.config = config;
    this.store = options.store;
    this.runId = options.runId ?? uuidv4();
    this.usage = options.usage ?? new UsageTracker();
    this.limit = createConcurrencyLimiter(config.concurrency);

    const gateway = new LLMGateway({
      usage: this.usage,
      providers: options.providers,
      maxRetries: config.maxRetries,
      retryDelayMs: config.retryDelayMs,
      timeoutMs: config.callTimeoutMs,
      defaults: { temperature: config.temperature, maxTokens: config.maxTokens },
    });

    this.extractor = new ConstraintExtractor(gateway, {
      model: config.models.constraints,
      numConstraints: config.numConstraints,
    });
    this.baseGenerator = new BaseGenerator(gateway, config.models.base);
    this.evaluator = new Evaluator(gateway, {
      model: config.models.evaluation,
      mode: config.evalMode,
      judgementRetries: config.judgementRetries,
    });
    this.fitter = new ConstraintFitter(gateway, {
      model: config.models.fitting,
      maxPasses: config.fitMaxPasses,
      selfCheck: config.fitSelfCheck ? this.evaluator : undefined,
      onBudget: config.fitOnBudget,
    });
  }

  /**
   * Read a CSV file into the run directory as its first table(s). Tables
   * the file does not produce are removed so later stages rebuild them.
   */
  async ingest(csvPath: string): Promise<IngestResult> {
    await this.store.initialize();
    const result = await ingestCsv(csvPath, { runId: this.runId, numConstraints: this.config.numConstraints });
    const produced = [result.source, result.constraints, result.base].filter((t): t is NonNullable<typeof t> => t !== undefined);
    for (const name of TableNameSchema.options) {
      const table = produced.find((t) => t.table === name);
      if (table) {
        await this.store.save(table);
      } else {
        await this.store.remove(name);
      }
    }
    return result;
  }

  /**
   * Run every stage from `from` onwards. A stage whose table exists is
   * skipped unless `force` is set; once a stage has run, every later stage
   * runs too so no table is built from a stale input.
   */
  async run(options: RunOptions = {}): Promise<RunReport> {
    await this.store.initialize();
    const start = STAGES.indexOf(options.from ?? "constraints");
    const stages: StageReport[] = [];
    let rebuilt = false;

    for (const stage of STAGES.slice(start)) {
      if (!options.force && !rebuilt && (await this.store.exists(STAGE_TABLES[stage]))) {
        const existing = await this.loadOutput(stage);
        logger.info({ stage, table: STAGE_TABLES[stage] }, "Stage table exists; skipping");
        stages.push(stageReport(stage, existing, true));
        continue;
      }
      stages.push(await this.runStage(stage));
      rebuilt = true;
    }

    return {
      runId: this.runId,
      stages,
      summary: await this.summarize(),
      usage: this.usage.snapshot(),
    };
  }

  /** Run one stage over its input table and persist the result. */
  async runStage(stage: StageName): Promise<StageReport> {
    await this.store.initialize();
    logger.info({ stage, runId: this.runId }, "Stage started");

    const table = await this.buildStage(stage);
    await this.store.save(table);

    const report = stageReport(stage, table, false);
    logger.info({ ...report, calls: this.usage.snapshot().calls }, "Stage complete");
    return report;
  }

  /** Aggregate statistics over the persisted evaluated table. */
  async summarize(): Promise<RunSummary> {
    const table = await this.store.load("evaluated", EvaluatedTableSchema);
    if (!table) {
      throw new Error(`No evaluated table in ${this.store.runDir}; run the evaluate stage first`);
    }
    return summarize(table);
  }

  // ── Stages ────────────────────────────────────────────────────────

  private async buildStage(stage: StageName): Promise<AnyTable> {
    const createdAt = new Date().toISOString();
    const header = { runId: this.runId, createdAt };

    switch (stage) {
      case "constraints": {
        const input = await this.requireTable("source", SourceTableSchema, stage);
        const rows = await this.processTable("constraints", input.rows, ConstrainedRecordSchema, async (record) => {
          const extraction = await this.extractor.extract(record.sourceContent, record.domain);
          return { id: record.id, domain: record.domain, ...extraction };
        });
        return { table: "constraints", ...header, rows };
      }
      case "base": {
        const input = await this.requireTable("constraints", ConstraintsTableSchema, stage);
        const rows = await this.processTable("base", input.rows, BaseRecordSchema, async (record) => ({
          ...record,
          baseContent: await this.baseGenerator.generate(record.taskDescription, record.domain),
        }));
        return { table: "base", ...header, rows };
      }
      case "expand": {
        const input = await this.requireTable("base", BaseTableSchema, stage);
        const { subsetSizes } = this.config;
        const rows = input.rows.flatMap((row): Array<TableRow<ExpandedRecord>> =>
          row.status === "failed"
            ? [row]
            : expandRecord(row.record, subsetSizes).map((record) => ({ status: "ok" as const, record })),
        );
        logger.info({ records: input.rows.length, rows: rows.length, subsetSizes }, "Constraint subsets expanded");
        return { table: "expanded", ...header, rows };
      }
      case "fit": {
        const input = await this.requireTable("expanded", ExpandedTableSchema, stage);
        const rows = await this.processTable("fitted", input.rows, FittedRecordSchema, async (record) => {
          const result = await this.fitter.fit({
            task: record.taskDescription,
            base: record.baseContent,
            constraints: record.constraints,
            domain: record.domain,
          });
          return { ...record, fittedContent: result.content, fitPasses: result.passes };
        });
        return { table: "fitted", ...header, rows };
      }
      case "evaluate": {
        const input = await this.requireTable("fitted", FittedTableSchema, stage);
        const rows = await this.processTable("evaluated", input.rows, EvaluatedRecordSchema, async (record) => {
          const result = await this.evaluator.evaluate(record.fittedContent, record.constraints, record.domain);
          return { ...record, verdicts: result.verdicts, satisfactionRate: result.satisfactionRate };
        });
        return { table: "evaluated", ...header, rows };
      }
    }
  }

  private async loadOutput(stage: StageName): Promise<AnyTable | null> {
    switch (stage) {
      case "constraints":
        return this.store.load("constraints", ConstraintsTableSchema);
      case "base":
        return this.store.load("base", BaseTableSchema);
      case "expand":
        return this.store.load("expanded", ExpandedTableSchema);
      case "fit":
        return this.store.load("fitted", FittedTableSchema);
      case "evaluate":
        return this.store.load("evaluated", EvaluatedTableSchema);
    }
  }

  private async requireTable<T>(
    name: TableName,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    stage: StageName,
  ): Promise<T> {
    const table = await this.store.load(name, schema);
    if (!table) {
      throw new Error(`Stage "${stage}" needs the ${name} table in ${this.store.runDir}`);
    }
    return table;
  }

  /**
   * Apply `handler` to every ok row under the concurrency limit.
   * Failed rows pass through; a thrown error or invalid output turns the
   * row into a failed row for `table`.
   */
  private processTable<I extends RecordIdentity, O>(
    table: TableName,
    rows: ReadonlyArray<TableRow<I>>,
    schema: z.ZodType<O, z.ZodTypeDef, unknown>,
    handler: (record: I) => Promise<O>,
  ): Promise<Array<TableRow<O>>> {
    return Promise.all(
      rows.map((row) =>
        row.status === "failed"
          ? Promise.resolve(row)
          : this.limit(() => this.processRecord(table, row.record, schema, handler)),
      ),
    );
  }

  private async processRecord<I extends RecordIdentity, O>(
    table: TableName,
    record: I,
    schema: z.ZodType<O, z.ZodTypeDef, unknown>,
    handler: (record: I) => Promise<O>,
  ): Promise<TableRow<O>> {
    try {
      const output = schema.parse(await handler(record));
      return { status: "ok", record: output };
    } catch (error) {
      const failure = toFailure(table, error);
      logger.error({ id: record.id, stage: table, kind: failure.kind, error: failure.message }, "Record failed");
      return { status: "failed", id: record.id, domain: record.domain, failure };
    }
  }
}

/**
 * Totals over an evaluated table. The mean satisfaction rate covers
 * succeeded records only.
 */
export function summarize(table: EvaluatedTable): RunSummary {
  const rates: number[] = [];
  const bySize = new Map<number, number[]>();
  const failures: RecordFailureSummary[] = [];
  for (const row of table.rows) {
    if (row.status === "ok") {
      const { satisfactionRate, subsetSize } = row.record;
      rates.push(satisfactionRate);
      bySize.set(subsetSize, [...(bySize.get(subsetSize) ?? []), satisfactionRate]);
    } else {
      failures.push({ id: row.id, ...row.failure });
    }
  }
  return {
    total: table.rows.length,
    succeeded: rates.length,
    failed: failures.length,
    meanSatisfactionRate: rates.length > 0 ? mean(rates) : null,
    bySubsetSize: [...bySize]
      .sort(([a], [b]) => a - b)
      .map(([subsetSize, sizeRates]) => ({
        subsetSize,
        records: sizeRates.length,
        meanSatisfactionRate: mean(sizeRates),
      })),
    failures,
  };
}

function mean(values: readonly number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

function toFailure(stage: TableName, error: unknown): RecordFailure {
  if (error instanceof ZodError) {
    return { stage, kind: "malformedEntry", message: `Invalid ${stage} record: ${formatIssues(error)}` };
  }
  if (error instanceof PipelineError) {
    return { stage, kind: error.kind, message: error.message };
  }
  return { stage, kind: "unknown", message: describeError(error) };
}

function stageReport(stage: StageName, table: AnyTable | null, skipped: boolean): StageReport {
  const rows: ReadonlyArray<{ status: "ok" | "failed" }> = table?.rows ?? [];
  const succeeded = rows.filter((row) => row.status === "ok").length;
  return {
    stage,
    table: STAGE_TABLES[stage],
    total: rows.length,
    succeeded,
    failed: rows.length - succeeded,
    skipped,
  };
}
