import { z } from "zod";
import type { CategoryInfo, Dataset, SpendingRecord } from "../types";

/** Bumped whenever the serialized Dataset layout changes; older cache files read as misses. */
export const DATASET_SCHEMA_VERSION = 1;

export const SpendingRecordSchema = z.object({
  category: z.string(),
  categoryLabel: z.string(),
  period: z.string(),
  amount: z.number(),
  unit: z.string(),
  sourceTableId: z.string(),
});

export const DatasetSchema = z.object({
  tableId: z.string(),
  label: z.string(),
  fetchedAt: z.number(),
  schemaVersion: z.number().int(),
  records: z.array(SpendingRecordSchema),
  categories: z.array(z.object({ code: z.string(), label: z.string() })),
  periods: z.array(z.string()),
});

export interface DatasetParts {
  tableId: string;
  label: string;
  fetchedAt: number;
  records: readonly SpendingRecord[];
  categories: readonly CategoryInfo[];
  periods: readonly string[];
}

/**
 * Build a deeply frozen Dataset. Copies its inputs so later mutation of the
 * parts cannot leak into a Dataset that readers already hold.
 */
export function createDataset(parts: DatasetParts): Dataset {
  return Object.freeze({
    tableId: parts.tableId,
    label: parts.label,
    fetchedAt: parts.fetchedAt,
    schemaVersion: DATASET_SCHEMA_VERSION,
    records: Object.freeze(parts.records.map((r) => Object.freeze({ ...r }))),
    categories: Object.freeze(parts.categories.map((c) => Object.freeze({ ...c }))),
    periods: Object.freeze([...parts.periods]),
  });
}

export function latestPeriod(dataset: Dataset): string | undefined {
  return dataset.periods[dataset.periods.length - 1];
}
