import { z } from "zod";

// ── Shared types ──────────────────────────────────────────────────────
export const DomainSchema = z.enum(["blog", "story", "news"]);
export type Domain = z.infer<typeof DomainSchema>;

export const ConstraintCategorySchema = z.enum(["content", "structure", "reasoning", "style", "other"]);
export type ConstraintCategory = z.infer<typeof ConstraintCategorySchema>;

// ── Constraint ────────────────────────────────────────────────────────
export const ConstraintSchema = z.object({
  index: z.number().int().positive(),
  description: z.string().trim().min(1),
  category: ConstraintCategorySchema,
});
export type Constraint = z.infer<typeof ConstraintSchema>;

/** Constraint list whose indices run 1..N in order. */
export const ConstraintListSchema = z.array(ConstraintSchema).superRefine((constraints, ctx) => {
  constraints.forEach((constraint, position) => {
    if (constraint.index !== position + 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [position, "index"],
        message: `expected index ${position + 1}, got ${constraint.index}`,
      });
    }
  });
});

// ── Evaluation verdict ────────────────────────────────────────────────
export const EvaluationVerdictSchema = z.object({
  index: z.number().int().positive(),
  satisfied: z.boolean(),
  explanation: z.string(),
});
export type EvaluationVerdict = z.infer<typeof EvaluationVerdictSchema>;

// ── Per-stage records ─────────────────────────────────────────────────
export const RecordIdentitySchema = z.object({
  id: z.string().trim().min(1),
  domain: DomainSchema,
});
export type RecordIdentity = z.infer<typeof RecordIdentitySchema>;

export const SourceRecordSchema = RecordIdentitySchema.extend({
  sourceContent: z.string().trim().min(1),
});
export type SourceRecord = z.infer<typeof SourceRecordSchema>;

export const ConstrainedRecordSchema = RecordIdentitySchema.extend({
  taskDescription: z.string().trim().min(1),
  constraints: ConstraintListSchema,
});
export type ConstrainedRecord = z.infer<typeof ConstrainedRecordSchema>;

export const BaseRecordSchema = ConstrainedRecordSchema.extend({
  baseContent: z.string(),
});
export type BaseRecord = z.infer<typeof BaseRecordSchema>;

/**
 * A base record bound to one constraint subset. `sourceId` names the record
 * it was expanded from; the constraint list holds exactly `subsetSize` entries.
 */
const ExpandedFields = BaseRecordSchema.extend({
  sourceId: z.string().trim().min(1),
  subsetSize: z.number().int().min(0),
});

function checkSubsetSize(
  record: { constraints: readonly unknown[]; subsetSize: number },
  ctx: z.RefinementCtx,
): void {
  if (record.constraints.length !== record.subsetSize) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["constraints"],
      message: `expected ${record.subsetSize} constraints, got ${record.constraints.length}`,
    });
  }
}

export const ExpandedRecordSchema = ExpandedFields.superRefine(checkSubsetSize);
export type ExpandedRecord = z.infer<typeof ExpandedRecordSchema>;

const FittedFields = ExpandedFields.extend({
  fittedContent: z.string(),
  fitPasses: z.number().int().min(0),
});

export const FittedRecordSchema = FittedFields.superRefine(checkSubsetSize);
export type FittedRecord = z.infer<typeof FittedRecordSchema>;

export const EvaluatedRecordSchema = FittedFields.extend({
  verdicts: z.array(EvaluationVerdictSchema),
  satisfactionRate: z.number().min(0).max(1),
}).superRefine((record, ctx) => {
  checkSubsetSize(record, ctx);
  if (record.verdicts.length !== record.constraints.length) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["verdicts"],
      message: `expected ${record.constraints.length} verdicts, got ${record.verdicts.length}`,
    });
    return;
  }
  record.verdicts.forEach((verdict, position) => {
    if (verdict.index !== record.constraints[position]?.index) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["verdicts", position, "index"],
        message: "verdicts must follow constraint order",
      });
    }
  });
  const satisfied = record.verdicts.filter((v) => v.satisfied).length;
  const expected = record.constraints.length === 0 ? 1 : satisfied / record.constraints.length;
  if (record.satisfactionRate !== expected) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["satisfactionRate"],
      message: `satisfactionRate must equal ${expected}`,
    });
  }
});
export type EvaluatedRecord = z.infer<typeof EvaluatedRecordSchema>;

// ── Stage tables ──────────────────────────────────────────────────────
export const TableNameSchema = z.enum(["source", "constraints", "base", "expanded", "fitted", "evaluated"]);
export type TableName = z.infer<typeof TableNameSchema>;

export const RecordFailureSchema = z.object({
  stage: TableNameSchema,
  kind: z.string().min(1),
  message: z.string(),
});
export type RecordFailure = z.infer<typeof RecordFailureSchema>;

export const FailedRowSchema = RecordIdentitySchema.extend({
  status: z.literal("failed"),
  failure: RecordFailureSchema,
});
export type FailedRow = z.infer<typeof FailedRowSchema>;

export type TableRow<R> = { status: "ok"; record: R } | FailedRow;

function tableSchema<N extends TableName, R extends z.ZodTypeAny>(name: N, record: R) {
  return z.object({
    table: z.literal(name),
    runId: z.string().min(1),
    createdAt: z.string().datetime(),
    rows: z.array(
      z.discriminatedUnion("status", [
        z.object({ status: z.literal("ok"), record }),
        FailedRowSchema,
      ]),
    ),
  });
}

export const SourceTableSchema = tableSchema("source", SourceRecordSchema);
export type SourceTable = z.infer<typeof SourceTableSchema>;

export const ConstraintsTableSchema = tableSchema("constraints", ConstrainedRecordSchema);
export type ConstraintsTable = z.infer<typeof ConstraintsTableSchema>;

export const BaseTableSchema = tableSchema("base", BaseRecordSchema);
export type BaseTable = z.infer<typeof BaseTableSchema>;

export const ExpandedTableSchema = tableSchema("expanded", ExpandedRecordSchema);
export type ExpandedTable = z.infer<typeof ExpandedTableSchema>;

export const FittedTableSchema = tableSchema("fitted", FittedRecordSchema);
export type FittedTable = z.infer<typeof FittedTableSchema>;

export const EvaluatedTableSchema = tableSchema("evaluated", EvaluatedRecordSchema);
export type EvaluatedTable = z.infer<typeof EvaluatedTableSchema>;

export type AnyTable = SourceTable | ConstraintsTable | BaseTable | ExpandedTable | FittedTable | EvaluatedTable;
