/**
 * Category name resolution for the household budget survey.
 * Accepts an SSB code ("04"), an English alias ("housing") or the published label.
 */

import { ToolLookupError } from "../errors";
import type { CategoryInfo, Dataset } from "../types";

export const CATEGORY_ALIASES: Readonly<Record<string, string>> = {
  food: "01",
  alcohol: "02",
  tobacco: "02",
  clothing: "03",
  clothes: "03",
  housing: "04",
  home: "04",
  furnishings: "05",
  furniture: "05",
  health: "06",
  medical: "06",
  transport: "07",
  transportation: "07",
  communication: "08",
  phone: "08",
  entertainment: "09",
  recreation: "09",
  culture: "09",
  education: "10",
  school: "10",
  restaurants: "11",
  hotels: "11",
  dining: "11",
  other: "12",
  miscellaneous: "12",
};

export function aliasesFor(code: string): string[] {
  return Object.entries(CATEGORY_ALIASES)
    .filter(([, c]) => c === code)
    .map(([alias]) => alias);
}

export function resolveCategory(input: string, dataset: Dataset): CategoryInfo {
  const needle = input.trim().toLowerCase();
  const { categories } = dataset;

  // "4" is the same category as "04"
  const code = /^\d$/.test(needle) ? `0${needle}` : needle;
  const byCode = categories.find((c) => c.code === code);
  if (byCode) return byCode;

  const aliased = CATEGORY_ALIASES[needle];
  if (aliased !== undefined) {
    const byAlias = categories.find((c) => c.code === aliased);
    if (byAlias) return byAlias;
  }

  const byLabel = categories.find((c) => c.label.toLowerCase() === needle);
  if (byLabel) return byLabel;

  throw new ToolLookupError(`Unknown category "${input}". Use list_categories to see the accepted names.`, {
    category: input,
    tableId: dataset.tableId,
  });
}
