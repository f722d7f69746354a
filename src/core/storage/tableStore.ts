import { createReadStream } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import csv from "csv-parser";
import { ZodError, type z } from "zod";
import { SchemaError } from "../errors/index.js";
import { createLogger } from "../logging/index.js";
import type { AnyTable, TableName } from "../schemas/index.js";

const logger = createLogger("table-store");

/**
 * File-based table store.
 * One JSON document per stage table under the run directory:
 *   <runDir>/source.json, constraints.json, base.json, expanded.json, fitted.json, evaluated.json
 */
export class TableStore {
  readonly runDir: string;

  constructor(runDir: string) {
    this.runDir = runDir;
  }

  /** Ensure the run directory exists. */
  async initialize(): Promise<void> {
    await fs.mkdir(this.runDir, { recursive: true });
  }

  pathOf(name: TableName): string {
    return path.join(this.runDir, `${name}.json`);
  }

  /** Write a table atomically (temp file + rename). */
  async save(table: AnyTable): Promise<string> {
    const filepath = this.pathOf(table.table);
    const tmp = `${filepath}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(table, null, 2), "utf-8");
    await fs.rename(tmp, filepath);
    logger.debug({ table: table.table, rows: table.rows.length, filepath }, "Table saved");
    return filepath;
  }

  /**
   * Load and validate a table. Returns null when the file does not exist;
   * a file that exists but fails validation is a SchemaError.
   */
  async load<T>(name: TableName, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null> {
    const filepath = this.pathOf(name);
    let data: string;
    try {
      data = await fs.readFile(filepath, "utf-8");
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }

    try {
      return schema.parse(JSON.parse(data));
    } catch (error) {
      if (error instanceof ZodError || error instanceof SyntaxError) {
        throw new SchemaError("malformedEntry", `Table ${filepath} is invalid: ${formatIssues(error)}`, {
          cause: error,
        });
      }
      throw error;
    }
  }

  /** Delete a table; a missing table is not an error. */
  async remove(name: TableName): Promise<void> {
    await fs.rm(this.pathOf(name), { force: true });
  }

  async exists(name: TableName): Promise<boolean> {
    try {
      await fs.access(this.pathOf(name));
      return true;
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }
}

/**
 * Read a CSV file into one plain object per row, keyed by header.
 * A file that cannot be read rejects with the read error.
 */
export async function readCsvRows(filepath: string): Promise<Array<Record<string, string>>> {
  const rows: Array<Record<string, string>> = [];
  const source = createReadStream(filepath);
  const parser = csv({ mapHeaders: ({ header }) => header.trim() });
  source.on("error", (error) => parser.destroy(error));
  source.pipe(parser);
  for await (const row of parser) {
    rows.push(toStringRecord(row));
  }
  return rows;
}

/** Readable one-line summary of a zod or JSON error. */
export function formatIssues(error: ZodError | SyntaxError): string {
  if (error instanceof ZodError) {
    return error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ");
  }
  return error.message;
}

function toStringRecord(row: unknown): Record<string, string> {
  const record: Record<string, string> = {};
  if (typeof row !== "object" || row === null) return record;
  for (const [key, value] of Object.entries(row)) {
    if (typeof value === "string") record[key] = value;
  }
  return record;
}

function isNotFound(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}
