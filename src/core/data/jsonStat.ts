/**
 * JSON-stat 2.0 dataset parsing.
 *
 * A JSON-stat dataset is a dense cube: `id` names the dimensions, `size` gives the
 * number of categories per dimension, and `value` holds the cells in row-major order
 * (last dimension varies fastest). Only one shape is accepted here: a category
 * dimension and a period dimension, with every other dimension fixed to one category.
 */

import { z } from "zod";
import { ParseError } from "../errors";
import type { CategoryInfo, SpendingRecord } from "../types";

const UnitSchema = z
  .object({
    base: z.string().optional(),
    decimals: z.number().optional(),
  })
  .passthrough();

const CategorySchema = z.object({
  index: z.union([z.record(z.number().int().nonnegative()), z.array(z.string())]).optional(),
  label: z.record(z.string()).optional(),
  unit: z.record(UnitSchema).optional(),
});

const DimensionSchema = z.object({
  label: z.string().optional(),
  category: CategorySchema,
});

export const JsonStatDatasetSchema = z.object({
  version: z.string().optional(),
  class: z.literal("dataset"),
  label: z.string().optional(),
  source: z.string().optional(),
  updated: z.string().optional(),
  id: z.array(z.string()).min(1),
  size: z.array(z.number().int().nonnegative()).min(1),
  dimension: z.record(DimensionSchema),
  value: z.union([z.array(z.number().nullable()), z.record(z.number().nullable())]),
});

export type JsonStatDataset = z.infer<typeof JsonStatDatasetSchema>;
type JsonStatCategory = z.infer<typeof CategorySchema>;

export interface JsonStatParseOptions {
  tableId: string;
  categoryDimension: string;
  periodDimension: string;
  /** Unit used when the payload carries none. */
  defaultUnit: string;
}

export interface ParsedTable {
  label: string;
  records: SpendingRecord[];
  categories: CategoryInfo[];
  periods: string[];
}

/**
 * Category codes of a dimension, in cube order.
 */
export function orderedCodes(category: JsonStatCategory): string[] {
  const { index, label } = category;
  if (Array.isArray(index)) return [...index];
  if (index) {
    return Object.entries(index)
      .sort(([, a], [, b]) => a - b)
      .map(([code]) => code);
  }
  // No index: a single-category dimension, identified by its label key
  return Object.keys(label ?? {});
}

export function parseJsonStat(payload: unknown, options: JsonStatParseOptions): ParsedTable {
  const { tableId, categoryDimension, periodDimension } = options;

  const parsed = JsonStatDatasetSchema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join(".") || "(root)";
    throw new ParseError(`Table ${tableId} is not a JSON-stat dataset: ${where}: ${issue?.message ?? "invalid"}`, {
      tableId,
      issues: parsed.error.issues.length,
    });
  }
  const data = parsed.data;

  if (data.id.length !== data.size.length) {
    throw new ParseError(
      `Table ${tableId}: ${data.id.length} dimension ids but ${data.size.length} sizes`,
      { tableId }
    );
  }

  const codesByDimension = data.id.map((dimId, i) => {
    const dimension = data.dimension[dimId];
    if (!dimension) {
      throw new ParseError(`Table ${tableId}: dimension "${dimId}" is declared but missing`, { tableId, dimension: dimId });
    }
    const codes = orderedCodes(dimension.category);
    if (codes.length !== data.size[i]) {
      throw new ParseError(
        `Table ${tableId}: dimension "${dimId}" has ${codes.length} categories but size ${data.size[i]}`,
        { tableId, dimension: dimId }
      );
    }
    return codes;
  });

  const cellCount = data.size.reduce((acc, n) => acc * n, 1);
  const values = data.value;
  if (Array.isArray(values)) {
    if (values.length !== cellCount) {
      throw new ParseError(
        `Table ${tableId}: value array has ${values.length} cells, dimensions imply ${cellCount}`,
        { tableId }
      );
    }
  } else {
    for (const key of Object.keys(values)) {
      const idx = Number(key);
      if (!Number.isInteger(idx) || idx < 0 || idx >= cellCount) {
        throw new ParseError(`Table ${tableId}: sparse value index "${key}" out of range`, { tableId });
      }
    }
  }

  const categoryPos = data.id.indexOf(categoryDimension);
  const periodPos = data.id.indexOf(periodDimension);
  if (categoryPos < 0 || periodPos < 0) {
    const missing = categoryPos < 0 ? categoryDimension : periodDimension;
    throw new ParseError(`Table ${tableId}: required dimension "${missing}" not found`, {
      tableId,
      dimensions: data.id,
    });
  }

  data.id.forEach((dimId, i) => {
    if (i !== categoryPos && i !== periodPos && data.size[i] !== 1) {
      throw new ParseError(
        `Table ${tableId}: dimension "${dimId}" must be fixed to one category (has ${data.size[i]})`,
        { tableId, dimension: dimId }
      );
    }
  });

  const unit = findUnit(data, options.defaultUnit);
  const categoryLabels = data.dimension[categoryDimension]?.category.label ?? {};
  const categories: CategoryInfo[] = codesByDimension[categoryPos].map((code) => ({
    code,
    label: categoryLabels[code] ?? code,
  }));
  const periods = [...codesByDimension[periodPos]];

  // strides for row-major addressing
  const strides = new Array<number>(data.size.length).fill(1);
  for (let i = data.size.length - 2; i >= 0; i--) {
    strides[i] = strides[i + 1] * data.size[i + 1];
  }

  const records: SpendingRecord[] = [];
  for (let cell = 0; cell < cellCount; cell++) {
    const amount = Array.isArray(values) ? values[cell] : values[String(cell)];
    if (amount === null || amount === undefined) continue;

    const categoryIdx = Math.floor(cell / strides[categoryPos]) % data.size[categoryPos];
    const periodIdx = Math.floor(cell / strides[periodPos]) % data.size[periodPos];
    const category = categories[categoryIdx];

    records.push({
      category: category.code,
      categoryLabel: category.label,
      period: periods[periodIdx],
      amount,
      unit,
      sourceTableId: tableId,
    });
  }

  return {
    label: data.label ?? `Table ${tableId}`,
    records,
    categories,
    periods,
  };
}

/**
 * First unit base declared on any dimension (SSB puts it on ContentsCode).
 */
function findUnit(data: JsonStatDataset, fallback: string): string {
  for (const dimension of Object.values(data.dimension)) {
    for (const unit of Object.values(dimension.category.unit ?? {})) {
      if (unit.base) return unit.base;
    }
  }
  return fallback;
}
