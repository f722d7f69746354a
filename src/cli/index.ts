#!/usr/bin/env node
/**
 * Constraint-fit pipeline CLI.
 *
 * Usage:
 *   constraint-fit run [input.csv] [--out dir] [--from stage] [--force]
 *   constraint-fit ingest <input.csv> [--out dir]
 *   constraint-fit stage <constraints|base|expand|fit|evaluate> [--out dir]
 *   constraint-fit summary [--out dir]
 *
 * Models, retries, pass budget and concurrency come from the environment
 * (see .env.example). Exit code 1 on any failure.
 */
import "dotenv/config";
import * as path from "node:path";
import { parseArgs } from "node:util";
import { loadConfig } from "../config/index.js";
import { describeError } from "../core/errors/index.js";
import {
  PipelineDriver,
  STAGES,
  type RunSummary,
  type StageName,
  type StageReport,
} from "../core/pipeline/driver.js";
import { TableStore } from "../core/storage/tableStore.js";
import type { UsageSnapshot } from "../core/usage/index.js";

const USAGE = `Usage:
  constraint-fit run [input.csv] [--out dir] [--from stage] [--force]
  constraint-fit ingest <input.csv> [--out dir]
  constraint-fit stage <${STAGES.join("|")}> [--out dir]
  constraint-fit summary [--out dir]`;

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      out: { type: "string", short: "o", default: "runs/latest" },
      from: { type: "string" },
      force: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  const [command, argument] = positionals;
  if (values.help || !command) {
    console.log(USAGE);
    process.exit(values.help ? 0 : 1);
  }

  const config = loadConfig();
  const outDir = path.resolve(process.cwd(), values.out ?? "runs/latest");
  const driver = new PipelineDriver({ config, store: new TableStore(outDir) });

  console.log("═══════════════════════════════════════════════════════");
  console.log("  Constraint-Fit Pipeline");
  console.log("═══════════════════════════════════════════════════════");
  console.log(`  Command:     ${command}`);
  console.log(`  Run dir:     ${outDir}`);
  console.log(`  Constraints: ${config.numConstraints} per record`);
  if (config.subsetSizes.length > 0) {
    console.log(`  Subsets:     ${config.subsetSizes.join(", ")}`);
  }
  console.log(`  Models:      ${config.models.constraints} / ${config.models.base} / ${config.models.fitting} / ${config.models.evaluation}`);
  console.log("───────────────────────────────────────────────────────\n");

  switch (command) {
    case "run": {
      if (argument) {
        await driver.ingest(path.resolve(process.cwd(), argument));
      }
      const report = await driver.run({ from: parseStage(values.from), force: values.force });
      console.log(`\n✅ Run ${report.runId} finished\n`);
      printStages(report.stages);
      printSummary(report.summary);
      printUsage(report.usage);
      break;
    }
    case "ingest": {
      if (!argument) throw new Error("ingest needs an input CSV path");
      const result = await driver.ingest(path.resolve(process.cwd(), argument));
      for (const table of [result.source, result.constraints, result.base]) {
        if (table) console.log(`  ${table.table.padEnd(12)} ${table.rows.length} rows`);
      }
      break;
    }
    case "stage": {
      const stage = parseStage(argument);
      if (!stage) throw new Error(`stage needs one of: ${STAGES.join(", ")}`);
      const report = await driver.runStage(stage);
      printStages([report]);
      printUsage(driver.usage.snapshot());
      break;
    }
    case "summary":
      printSummary(await driver.summarize());
      break;
    default:
      console.error(USAGE);
      process.exit(1);
  }
}

function parseStage(value: string | undefined): StageName | undefined {
  if (value === undefined) return undefined;
  const stage = STAGES.find((s) => s === value);
  if (!stage) throw new Error(`Unknown stage "${value}"; expected one of: ${STAGES.join(", ")}`);
  return stage;
}

function printStages(stages: readonly StageReport[]): void {
  console.log("── Stages ─────────────────────────────────────────");
  for (const s of stages) {
    const note = s.skipped ? " (skipped, table exists)" : "";
    console.log(`  ${s.stage.padEnd(12)} ${s.succeeded}/${s.total} ok, ${s.failed} failed${note}`);
  }
}

function printSummary(summary: RunSummary): void {
  console.log("\n── Summary ────────────────────────────────────────");
  console.log(`  Records:     ${summary.total}`);
  console.log(`  Succeeded:   ${summary.succeeded}`);
  console.log(`  Failed:      ${summary.failed}`);
  const mean = summary.meanSatisfactionRate;
  console.log(`  Mean rate:   ${mean === null ? "n/a" : `${(mean * 100).toFixed(1)}%`}`);
  if (summary.bySubsetSize.length > 1) {
    for (const bucket of summary.bySubsetSize) {
      const label = `${bucket.subsetSize} constraints`.padEnd(16);
      console.log(`    ${label} ${(bucket.meanSatisfactionRate * 100).toFixed(1)}% over ${bucket.records} records`);
    }
  }
  for (const f of summary.failures) {
    console.log(`  ✗ ${f.id} [${f.stage}/${f.kind}] ${f.message}`);
  }
}

function printUsage(usage: UsageSnapshot): void {
  console.log("\n── Usage ──────────────────────────────────────────");
  console.log(`  Calls:       ${usage.calls} (${usage.failedCalls} failed)`);
  console.log(`  Tokens:      ${usage.promptTokens} prompt + ${usage.completionTokens} completion`);
  console.log(`  Est. cost:   $${usage.estimatedCostUsd.toFixed(4)}`);
  for (const [provider, totals] of Object.entries(usage.byProvider)) {
    console.log(`    ${provider.padEnd(10)} ${totals.calls} calls, ${totals.totalTokens} tokens`);
  }
}

main().catch((error: unknown) => {
  console.error(`\n❌ Pipeline failed: ${describeError(error)}`);
  process.exit(1);
});
