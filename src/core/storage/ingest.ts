import { validateConstraints } from "../constraints/index.js";
import { describeError, PipelineError, SchemaError } from "../errors/index.js";
import { createLogger } from "../logging/index.js";
import {
  DomainSchema,
  type BaseTable,
  type ConstrainedRecord,
  type ConstraintsTable,
  type Domain,
  type FailedRow,
  type SourceTable,
  type TableRow,
} from "../schemas/index.js";
import { readCsvRows } from "./tableStore.js";

const logger = createLogger("ingest");

export interface IngestOptions {
  runId: string;
  numConstraints: number;
}

/**
 * Tables produced from one CSV file. A `content` column yields a source
 * table; `task_description` + `constraints` yield a constraints table, and
 * a `base_content` column a base table as well.
 */
export interface IngestResult {
  source?: SourceTable;
  constraints?: ConstraintsTable;
  base?: BaseTable;
}

export async function ingestCsv(filepath: string, options: IngestOptions): Promise<IngestResult> {
  const rows = await readCsvRows(filepath);
  const result = ingestRows(rows, options);
  logger.info(
    {
      filepath,
      rows: rows.length,
      tables: Object.keys(result),
    },
    "CSV ingested",
  );
  return result;
}

/**
 * Build stage tables from parsed CSV rows.
 * A missing id, unknown domain or repeated id rejects the whole file;
 * constraint lists that fail validation become failed rows.
 */
export function ingestRows(rows: ReadonlyArray<Record<string, string>>, options: IngestOptions): IngestResult {
  const createdAt = new Date().toISOString();
  const seen = new Set<string>();
  const entries = rows.map((row, i) => {
    const identity = identify(row, i + 1);
    if (seen.has(identity.id)) {
      throw new SchemaError("malformedEntry", `Duplicate id "${identity.id}" at row ${i + 1}`, { position: i + 1 });
    }
    seen.add(identity.id);
    return { row, ...identity };
  });

  const first = rows[0] ?? {};
  if ("content" in first) {
    return {
      source: {
        table: "source",
        runId: options.runId,
        createdAt,
        rows: entries.map(({ row, id, domain }) => {
          const sourceContent = (row["content"] ?? "").trim();
          if (!sourceContent) {
            return failed(id, domain, "source", new SchemaError("malformedEntry", "Empty content"));
          }
          return { status: "ok" as const, record: { id, domain, sourceContent } };
        }),
      },
    };
  }

  if (!("task_description" in first) || !("constraints" in first)) {
    throw new SchemaError(
      "malformedEntry",
      'CSV needs a "content" column, or "task_description" and "constraints" columns',
    );
  }

  const constrained: Array<TableRow<ConstrainedRecord>> = entries.map(({ row, id, domain }) => {
    try {
      const taskDescription = (row["task_description"] ?? "").trim();
      if (!taskDescription) throw new SchemaError("malformedEntry", "Empty task description");
      const constraints = validateConstraints(row["constraints"] ?? "", options.numConstraints);
      return { status: "ok" as const, record: { id, domain, taskDescription, constraints } };
    } catch (error) {
      return failed(id, domain, "constraints", error);
    }
  });

  const result: IngestResult = {
    constraints: { table: "constraints", runId: options.runId, createdAt, rows: constrained },
  };

  if ("base_content" in first) {
    result.base = {
      table: "base",
      runId: options.runId,
      createdAt,
      rows: constrained.map((row, i) =>
        row.status === "ok"
          ? { status: "ok" as const, record: { ...row.record, baseContent: baseContentAt(entries[i]?.row) } }
          : row,
      ),
    };
  }

  return result;
}

function baseContentAt(row: Record<string, string> | undefined): string {
  return (row?.["base_content"] ?? "").trim();
}

function identify(row: Record<string, string>, position: number): { id: string; domain: Domain } {
  const id = (row["id"] ?? "").trim();
  if (!id) {
    throw new SchemaError("malformedEntry", `Row ${position} has no id`, { position });
  }
  const domain = DomainSchema.safeParse((row["domain"] ?? "").trim().toLowerCase());
  if (!domain.success) {
    throw new SchemaError("malformedEntry", `Row ${position} has unknown domain "${row["domain"] ?? ""}"`, {
      position,
    });
  }
  return { id, domain: domain.data };
}

function failed(id: string, domain: Domain, stage: FailedRow["failure"]["stage"], error: unknown): FailedRow {
  const kind = error instanceof PipelineError ? error.kind : "unknown";
  return { status: "failed", id, domain, failure: { stage, kind, message: describeError(error) } };
}
