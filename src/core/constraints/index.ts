import { z } from "zod";
import { SchemaError } from "../errors/index.js";
import {
  ConstraintCategorySchema,
  type Constraint,
  type ConstraintCategory,
} from "../schemas/index.js";

const NUMBERED_LINE = /^\s*(\d+)[.)](?:\s+(.*))?$/;
const CATEGORY_TAG = /^\[(content|structure|reasoning|style|other)\]\s*/i;

const RawEntrySchema = z.union([
  z.string(),
  z.object({
    index: z.number().int().optional(),
    description: z.string(),
    category: ConstraintCategorySchema.optional(),
  }),
]);
const RawListSchema = z.array(RawEntrySchema);

interface NumberedEntry {
  index: number;
  text: string;
}

/**
 * Split a numbered list ("1. …\n2. …") into entries.
 * Unnumbered lines that follow an entry are treated as its continuation;
 * anything before the first numbered line is ignored.
 */
export function parseNumberedList(text: string): NumberedEntry[] {
  const entries: NumberedEntry[] = [];
  for (const line of text.split(/\r?\n/)) {
    const match = NUMBERED_LINE.exec(line);
    if (match) {
      entries.push({ index: Number(match[1]), text: (match[2] ?? "").trim() });
      continue;
    }
    const last = entries[entries.length - 1];
    const trimmed = line.trim();
    if (last && trimmed) {
      last.text = last.text ? `${last.text} ${trimmed}` : trimmed;
    }
  }
  return entries;
}

/**
 * Validate raw constraints into an ordered list of exactly `expectedCount`.
 *
 * Accepts the numbered-list text form or an array of strings / objects.
 * Nothing is truncated, padded or deduplicated: a wrong count is a
 * `wrongCount` error, an empty or misnumbered entry a `malformedEntry` error.
 */
export function validateConstraints(raw: unknown, expectedCount: number): Constraint[] {
  const entries = normalize(raw);

  if (entries.length !== expectedCount) {
    throw new SchemaError(
      "wrongCount",
      `Expected ${expectedCount} constraints, found ${entries.length}`,
      { expected: expectedCount, actual: entries.length },
    );
  }

  return entries.map((entry, i) => {
    const position = i + 1;
    if (entry.index !== undefined && entry.index !== position) {
      throw new SchemaError(
        "malformedEntry",
        `Constraint at position ${position} is numbered ${entry.index}`,
        { position },
      );
    }

    const { category, description } = splitCategory(entry.description, entry.category);
    if (!description) {
      throw new SchemaError("malformedEntry", `Constraint ${position} has an empty description`, {
        position,
      });
    }

    return { index: position, description, category };
  });
}

/** Render constraints in the numbered form used in prompts and CSV columns. */
export function formatConstraints(constraints: readonly Constraint[]): string {
  return constraints.map((c) => `${c.index}. ${c.description}`).join("\n");
}

// ── Helpers ───────────────────────────────────────────────────────────

interface NormalizedEntry {
  index?: number;
  description: string;
  category?: ConstraintCategory;
}

function normalize(raw: unknown): NormalizedEntry[] {
  if (typeof raw === "string") {
    return parseNumberedList(raw).map((e) => ({ index: e.index, description: e.text }));
  }

  const parsed = RawListSchema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.errors[0]?.path[0];
    const position = typeof first === "number" ? first + 1 : undefined;
    throw new SchemaError(
      "malformedEntry",
      `Constraints must be a numbered list or an array of entries${position ? ` (entry ${position} is invalid)` : ""}`,
      { position, cause: parsed.error },
    );
  }

  return parsed.data.map((entry) =>
    typeof entry === "string" ? { description: entry } : entry,
  );
}

function splitCategory(
  text: string,
  explicit: ConstraintCategory | undefined,
): { category: ConstraintCategory; description: string } {
  const trimmed = text.trim();
  const tag = CATEGORY_TAG.exec(trimmed);
  if (!tag?.[1]) {
    return { category: explicit ?? "other", description: trimmed };
  }
  const category = ConstraintCategorySchema.parse(tag[1].toLowerCase());
  return { category: explicit ?? category, description: trimmed.slice(tag[0].length).trim() };
}
