import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { SchemaError } from "../core/errors/index.js";
import { SourceTableSchema, type SourceTable } from "../core/schemas/index.js";
import { ingestCsv, ingestRows } from "../core/storage/ingest.js";
import { TableStore, readCsvRows } from "../core/storage/tableStore.js";

const CREATED_AT = "2026-01-01T00:00:00.000Z";

describe("TableStore", () => {
  let tempDir: string;
  let store: TableStore;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "constraint-fit-store-"));
    store = new TableStore(path.join(tempDir, "run"));
    await store.initialize();
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should save and load a table", async () => {
    const table: SourceTable = {
      table: "source",
      runId: "run-1",
      createdAt: CREATED_AT,
      rows: [
        { status: "ok", record: { id: "a", domain: "blog", sourceContent: "Hello" } },
        { status: "failed", id: "b", domain: "news", failure: { stage: "source", kind: "malformedEntry", message: "Empty content" } },
      ],
    };

    const filepath = await store.save(table);
    const loaded = await store.load("source", SourceTableSchema);

    expect(filepath).toBe(path.join(tempDir, "run", "source.json"));
    expect(loaded).toEqual(table);
    expect(await store.exists("source")).toBe(true);
  });

  it("should return null for a missing table", async () => {
    expect(await store.load("source", SourceTableSchema)).toBeNull();
    expect(await store.exists("source")).toBe(false);
  });

  it("should reject a table that fails validation", async () => {
    await fs.writeFile(store.pathOf("source"), JSON.stringify({ table: "source", rows: "nope" }), "utf-8");

    await expect(store.load("source", SourceTableSchema)).rejects.toBeInstanceOf(SchemaError);
  });

  it("should reject a table that is not JSON", async () => {
    await fs.writeFile(store.pathOf("source"), "{ not json", "utf-8");

    await expect(store.load("source", SourceTableSchema)).rejects.toMatchObject({ kind: "malformedEntry" });
  });

  it("should remove tables and ignore missing ones", async () => {
    await fs.writeFile(store.pathOf("base"), "{}", "utf-8");

    await store.remove("base");
    await store.remove("fitted");

    expect(await store.exists("base")).toBe(false);
  });
});

describe("CSV ingestion", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "constraint-fit-csv-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function writeCsv(content: string): Promise<string> {
    const filepath = path.join(tempDir, "input.csv");
    await fs.writeFile(filepath, content, "utf-8");
    return filepath;
  }

  it("should read quoted fields with commas and newlines", async () => {
    const filepath = await writeCsv('id,domain,content\nr1,blog,"Hello, world\nsecond line"\n');

    const rows = await readCsvRows(filepath);

    expect(rows).toEqual([{ id: "r1", domain: "blog", content: "Hello, world\nsecond line" }]);
  });

  it("should reject when the file does not exist", async () => {
    const missing = path.join(tempDir, "missing.csv");

    await expect(readCsvRows(missing)).rejects.toMatchObject({ code: "ENOENT" });
    await expect(ingestCsv(missing, { runId: "run-1", numConstraints: 1 })).rejects.toMatchObject({ code: "ENOENT" });
  });

  it("should build a source table from a content column", async () => {
    const filepath = await writeCsv("id,domain,content\nr1,blog,First post\nr2,News,\n");

    const result = await ingestCsv(filepath, { runId: "run-1", numConstraints: 3 });

    expect(result.constraints).toBeUndefined();
    expect(result.source?.rows).toEqual([
      { status: "ok", record: { id: "r1", domain: "blog", sourceContent: "First post" } },
      {
        status: "failed",
        id: "r2",
        domain: "news",
        failure: { stage: "source", kind: "malformedEntry", message: "Empty content" },
      },
    ]);
  });

  it("should build constraints and base tables from pre-extracted columns", async () => {
    const filepath = await writeCsv(
      'id,domain,task_description,constraints,base_content\n' +
        's1,story,Write a fable.,"1. Include a fox\n2. End with a moral",Once there was a fox.\n' +
        's2,story,Write a fable.,"1. Only one",Short.\n',
    );

    const result = await ingestCsv(filepath, { runId: "run-1", numConstraints: 2 });

    const [ok, bad] = result.constraints?.rows ?? [];
    expect(ok).toEqual({
      status: "ok",
      record: {
        id: "s1",
        domain: "story",
        taskDescription: "Write a fable.",
        constraints: [
          { index: 1, description: "Include a fox", category: "other" },
          { index: 2, description: "End with a moral", category: "other" },
        ],
      },
    });
    expect(bad).toMatchObject({ status: "failed", id: "s2", failure: { stage: "constraints", kind: "wrongCount" } });
    expect(result.base?.rows[0]).toMatchObject({ status: "ok", record: { baseContent: "Once there was a fox." } });
    expect(result.base?.rows[1]).toEqual(bad);
  });

  it("should reject duplicate ids", () => {
    const rows = [
      { id: "x", domain: "blog", content: "one" },
      { id: "x", domain: "blog", content: "two" },
    ];
    expect(() => ingestRows(rows, { runId: "run-1", numConstraints: 1 })).toThrow('Duplicate id "x" at row 2');
  });

  it("should reject unknown domains", () => {
    const rows = [{ id: "x", domain: "poem", content: "one" }];
    expect(() => ingestRows(rows, { runId: "run-1", numConstraints: 1 })).toThrow(SchemaError);
  });

  it("should reject files without usable columns", () => {
    const rows = [{ id: "x", domain: "blog", text: "one" }];
    expect(() => ingestRows(rows, { runId: "run-1", numConstraints: 1 })).toThrow(/needs a "content" column/);
  });
});
