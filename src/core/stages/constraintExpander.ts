import type { BaseRecord, ExpandedRecord } from "../schemas/index.js";

/**
 * Constraint Expander
 * Splits one record into progressively larger constraint subsets so the
 * same base can be fitted against 7, 15, 23, … constraints and the rates
 * compared. Each subset is a prefix of the full list, so indices stay 1..k.
 *
 * Sizes above the list length are clamped to it and duplicate sizes
 * collapse into one record. With no sizes the record passes through whole,
 * keeping its id.
 */
export function expandRecord(record: BaseRecord, subsetSizes: readonly number[]): ExpandedRecord[] {
  const total = record.constraints.length;
  if (subsetSizes.length === 0) {
    return [{ ...record, sourceId: record.id, subsetSize: total }];
  }

  const sizes = [...new Set(subsetSizes.map((size) => Math.min(size, total)))].sort((a, b) => a - b);
  return sizes.map((size) => ({
    ...record,
    id: subsetId(record.id, size),
    sourceId: record.id,
    subsetSize: size,
    constraints: record.constraints.slice(0, size),
  }));
}

function subsetId(id: string, size: number): string {
  return `${id}@${size}`;
}
