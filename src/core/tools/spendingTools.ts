/**
 * Household spending tools over a household-budget Dataset.
 * Amounts in the table are annual NOK per household; monthly = annual / 12.
 */

import { latestPeriod } from "../data/dataset";
import { ToolLookupError } from "../errors";
import type { ToolDefinition, ToolRegistry } from "../tool-engine";
import type { CategoryInfo, Dataset, SpendingRecord } from "../types";
import { aliasesFor, resolveCategory } from "./categories";

export const MONTHS_PER_YEAR = 12;

export interface CategorySpending {
  category: string;
  categoryLabel: string;
  period: string;
  annual: number;
  monthly: number;
  unit: string;
}

export interface SpendingComparison {
  first: CategorySpending;
  second: CategorySpending;
  /** first / second; null when the second amount is zero. */
  ratio: number | null;
  monthlyDifference: number;
}

export interface TotalSpending {
  period: string;
  annual: number;
  monthly: number;
  unit: string;
  categoryCount: number;
}

export function formatNok(amount: number): string {
  return Math.round(amount).toLocaleString("en-US");
}

function source(dataset: Dataset, period: string): string {
  return `Source: Statistics Norway table ${dataset.tableId}, period ${period}.`;
}

function optionalString(args: Record<string, unknown>, key: string): string | undefined {
  const value = args[key];
  return typeof value === "string" && value.trim() !== "" ? value.trim() : undefined;
}

function requiredString(args: Record<string, unknown>, key: string): string {
  const value = args[key];
  // already enforced by the schema; this narrows the type
  return typeof value === "string" ? value : String(value);
}

export function resolvePeriod(requested: string | undefined, dataset: Dataset): string {
  if (requested === undefined) {
    const latest = latestPeriod(dataset);
    if (latest === undefined) {
      throw new ToolLookupError(`Table ${dataset.tableId} has no periods`, { tableId: dataset.tableId });
    }
    return latest;
  }
  if (!dataset.periods.includes(requested)) {
    throw new ToolLookupError(
      `Period "${requested}" is not in table ${dataset.tableId}. Available periods: ${dataset.periods.join(", ")}`,
      { tableId: dataset.tableId, period: requested }
    );
  }
  return requested;
}

function findRecord(dataset: Dataset, category: CategoryInfo, period: string): SpendingRecord {
  const record = dataset.records.find((r) => r.category === category.code && r.period === period);
  if (!record) {
    throw new ToolLookupError(`No figure for ${category.label} in period ${period}`, {
      tableId: dataset.tableId,
      category: category.code,
      period,
    });
  }
  return record;
}

export function spendingFor(dataset: Dataset, categoryInput: string, period: string): CategorySpending {
  const category = resolveCategory(categoryInput, dataset);
  const record = findRecord(dataset, category, period);
  return {
    category: record.category,
    categoryLabel: record.categoryLabel,
    period: record.period,
    annual: record.amount,
    monthly: record.amount / MONTHS_PER_YEAR,
    unit: record.unit,
  };
}

export const getAverageSpending: ToolDefinition = {
  name: "get_average_spending",
  aliases: ["get_spending", "get_average_spending_by_category"],
  description: "Average household spending on one category, annual and per month.",
  parameters: {
    type: "object",
    properties: {
      category: { type: "string", description: "Category code, alias (e.g. housing, food) or label" },
      period: { type: "string", description: "Survey period; defaults to the latest" },
    },
    required: ["category"],
    additionalProperties: false,
  },
  execute(args, dataset) {
    const period = resolvePeriod(optionalString(args, "period"), dataset);
    const spending = spendingFor(dataset, requiredString(args, "category"), period);
    return {
      result: spending,
      summary:
        `Norwegian households spend an average of ${formatNok(spending.monthly)} ${spending.unit} per month ` +
        `on ${spending.categoryLabel} (${formatNok(spending.annual)} ${spending.unit} per year). ` +
        source(dataset, period),
      provenance: { tableId: dataset.tableId, period },
    };
  },
};

export const compareSpending: ToolDefinition = {
  name: "compare_spending",
  aliases: ["compare_spending_categories"],
  description: "Compare average household spending between two categories.",
  parameters: {
    type: "object",
    properties: {
      category1: { type: "string", description: "First category" },
      category2: { type: "string", description: "Second category" },
      period: { type: "string", description: "Survey period; defaults to the latest" },
    },
    required: ["category1", "category2"],
    additionalProperties: false,
  },
  execute(args, dataset) {
    const period = resolvePeriod(optionalString(args, "period"), dataset);
    const first = spendingFor(dataset, requiredString(args, "category1"), period);
    const second = spendingFor(dataset, requiredString(args, "category2"), period);
    const comparison: SpendingComparison = {
      first,
      second,
      ratio: second.annual === 0 ? null : first.annual / second.annual,
      monthlyDifference: first.monthly - second.monthly,
    };

    const ratioText =
      comparison.ratio === null
        ? `${second.categoryLabel} spending is zero, so no ratio can be given`
        : `${first.categoryLabel} is ${comparison.ratio.toFixed(2)} times ${second.categoryLabel}`;

    return {
      result: comparison,
      summary:
        `${first.categoryLabel}: ${formatNok(first.monthly)} ${first.unit} per month; ` +
        `${second.categoryLabel}: ${formatNok(second.monthly)} ${second.unit} per month. ` +
        `${ratioText}, a difference of ${formatNok(comparison.monthlyDifference)} ${first.unit} per month. ` +
        source(dataset, period),
      provenance: { tableId: dataset.tableId, period },
    };
  },
};

export const getTotalSpending: ToolDefinition = {
  name: "get_total_spending",
  aliases: ["get_total_household_spending"],
  description: "Total average household spending over all main categories.",
  parameters: {
    type: "object",
    properties: {
      period: { type: "string", description: "Survey period; defaults to the latest" },
    },
    additionalProperties: false,
  },
  execute(args, dataset) {
    const period = resolvePeriod(optionalString(args, "period"), dataset);
    const records = dataset.records.filter((r) => r.period === period);
    if (records.length === 0) {
      throw new ToolLookupError(`No figures for period ${period}`, { tableId: dataset.tableId, period });
    }
    const annual = records.reduce((sum, r) => sum + r.amount, 0);
    const total: TotalSpending = {
      period,
      annual,
      monthly: annual / MONTHS_PER_YEAR,
      unit: records[0].unit,
      categoryCount: records.length,
    };
    return {
      result: total,
      summary:
        `Total average household spending is ${formatNok(total.monthly)} ${total.unit} per month ` +
        `(${formatNok(total.annual)} ${total.unit} per year) across ${total.categoryCount} categories. ` +
        source(dataset, period),
      provenance: { tableId: dataset.tableId, period },
    };
  },
};

export const listCategories: ToolDefinition = {
  name: "list_categories",
  description: "List the spending categories with their codes and accepted names.",
  parameters: {
    type: "object",
    properties: {},
    additionalProperties: false,
  },
  execute(_args, dataset) {
    const period = resolvePeriod(undefined, dataset);
    const categories = dataset.categories.map((c) => ({ code: c.code, label: c.label, aliases: aliasesFor(c.code) }));
    const lines = categories.map((c) =>
      c.aliases.length > 0 ? `${c.code} ${c.label} (${c.aliases.join(", ")})` : `${c.code} ${c.label}`
    );
    return {
      result: categories,
      summary: `Available categories: ${lines.join("; ")}.`,
      provenance: { tableId: dataset.tableId, period },
    };
  },
};

export const SPENDING_TOOLS: readonly ToolDefinition[] = [
  getAverageSpending,
  compareSpending,
  listCategories,
  getTotalSpending,
];

export function registerSpendingTools(registry: ToolRegistry): ToolRegistry {
  for (const tool of SPENDING_TOOLS) registry.register(tool);
  return registry;
}
