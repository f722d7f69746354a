import { describe, it, expect } from "vitest";
import {
  ConstraintListSchema,
  ConstraintSchema,
  EvaluatedRecordSchema,
  EvaluatedTableSchema,
  ExpandedRecordSchema,
  FittedRecordSchema,
} from "../core/schemas/index.js";

const constraints = [
  { index: 1, description: "Open with a question", category: "structure" },
  { index: 2, description: "Name one tool", category: "content" },
];

const fitted = {
  id: "r1",
  domain: "blog",
  taskDescription: "Write about woodworking",
  constraints,
  baseContent: "Base.",
  sourceId: "r1",
  subsetSize: 2,
  fittedContent: "Fitted.",
  fitPasses: 1,
};

describe("Schemas", () => {
  describe("ConstraintSchema", () => {
    it("should accept a valid constraint", () => {
      expect(ConstraintSchema.safeParse(constraints[0]).success).toBe(true);
    });

    it("should reject an empty description", () => {
      expect(ConstraintSchema.safeParse({ index: 1, description: "  ", category: "other" }).success).toBe(false);
    });

    it("should reject an unknown category", () => {
      expect(ConstraintSchema.safeParse({ index: 1, description: "x", category: "tone" }).success).toBe(false);
    });
  });

  describe("ConstraintListSchema", () => {
    it("should require indices to follow positions", () => {
      const result = ConstraintListSchema.safeParse([constraints[1], constraints[0]]);
      expect(result.success).toBe(false);
    });
  });

  describe("FittedRecordSchema", () => {
    it("should accept a fitted record", () => {
      expect(FittedRecordSchema.safeParse(fitted).success).toBe(true);
    });

    it("should reject an unknown domain", () => {
      expect(FittedRecordSchema.safeParse({ ...fitted, domain: "poem" }).success).toBe(false);
    });
  });

  describe("ExpandedRecordSchema", () => {
    it("should require the constraint count to match the subset size", () => {
      const { fittedContent: _content, fitPasses: _passes, ...expanded } = fitted;
      expect(ExpandedRecordSchema.safeParse(expanded).success).toBe(true);

      const result = ExpandedRecordSchema.safeParse({ ...expanded, subsetSize: 3 });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.errors[0]?.message).toBe("expected 3 constraints, got 2");
      }
    });
  });

  describe("EvaluatedRecordSchema", () => {
    const verdicts = [
      { index: 1, satisfied: true, explanation: "Starts with 'Why?'" },
      { index: 2, satisfied: false, explanation: "No tool named" },
    ];

    it("should accept a rate derived from the verdicts", () => {
      const result = EvaluatedRecordSchema.safeParse({ ...fitted, verdicts, satisfactionRate: 0.5 });
      expect(result.success).toBe(true);
    });

    it("should reject a rate that disagrees with the verdicts", () => {
      const result = EvaluatedRecordSchema.safeParse({ ...fitted, verdicts, satisfactionRate: 1 });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.errors[0]?.path).toEqual(["satisfactionRate"]);
      }
    });

    it("should reject verdicts out of constraint order", () => {
      const result = EvaluatedRecordSchema.safeParse({
        ...fitted,
        verdicts: [verdicts[1], verdicts[0]],
        satisfactionRate: 0.5,
      });
      expect(result.success).toBe(false);
    });

    it("should reject a missing verdict", () => {
      const result = EvaluatedRecordSchema.safeParse({ ...fitted, verdicts: [verdicts[0]], satisfactionRate: 1 });
      expect(result.success).toBe(false);
    });

    it("should give an empty constraint list a rate of 1", () => {
      const empty = { ...fitted, constraints: [], subsetSize: 0, verdicts: [] };
      expect(EvaluatedRecordSchema.safeParse({ ...empty, satisfactionRate: 1 }).success).toBe(true);
      expect(EvaluatedRecordSchema.safeParse({ ...empty, satisfactionRate: 0 }).success).toBe(false);
    });
  });

  describe("EvaluatedTableSchema", () => {
    it("should accept ok and failed rows", () => {
      const result = EvaluatedTableSchema.safeParse({
        table: "evaluated",
        runId: "run-1",
        createdAt: "2026-01-01T00:00:00.000Z",
        rows: [
          { status: "ok", record: { ...fitted, verdicts: [], constraints: [], subsetSize: 0, satisfactionRate: 1 } },
          { status: "failed", id: "r2", domain: "story", failure: { stage: "fitted", kind: "budgetExceeded", message: "x" } },
        ],
      });
      expect(result.success).toBe(true);
    });

    it("should reject a table with the wrong name", () => {
      const result = EvaluatedTableSchema.safeParse({
        table: "fitted",
        runId: "run-1",
        createdAt: "2026-01-01T00:00:00.000Z",
        rows: [],
      });
      expect(result.success).toBe(false);
    });
  });
});
