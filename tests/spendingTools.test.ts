/**
 * Spending tools through the ToolRegistry
 */

import { createDataset } from "../src/core/data/dataset";
import { EventBus } from "../src/core/eventBus";
import { formatParameters, ToolRegistry } from "../src/core/tool-engine";
import { resolveCategory } from "../src/core/tools/categories";
import { registerSpendingTools } from "../src/core/tools/spendingTools";
import type { Dataset, Observation } from "../src/core/types";
import { fixtureDataset, spendingRegistry } from "./helpers/fixtures";

describe("spending tools", () => {
  let registry: ToolRegistry;
  let dataset: Dataset;

  beforeEach(() => {
    registry = spendingRegistry();
    dataset = fixtureDataset();
  });

  test("get_average_spending should report monthly and annual amounts with provenance", () => {
    const obs = registry.invoke({ toolName: "get_average_spending", arguments: { category: "housing" } }, dataset);

    expect(obs.ok).toBe(true);
    expect(obs.result).toEqual({
      category: "04",
      categoryLabel: "Housing",
      period: "2012",
      annual: 182808,
      monthly: 15234,
      unit: "NOK",
    });
    expect(obs.summary).toBe(
      "Norwegian households spend an average of 15,234 NOK per month on Housing (182,808 NOK per year). " +
        "Source: Statistics Norway table 10235, period 2012."
    );
    expect(obs.provenance).toEqual({ tableId: "10235", period: "2012" });
    expect(Object.isFrozen(obs)).toBe(true);
  });

  test("get_average_spending should honor an explicit period, coercing numbers", () => {
    const obs = registry.invoke({ toolName: "get_average_spending", arguments: { category: "01", period: 2009 } }, dataset);

    expect(obs.ok).toBe(true);
    expect(obs.provenance).toEqual({ tableId: "10235", period: "2009" });
    expect(obs.summary).toContain("5,850 NOK per month on Food");
  });

  test("should be idempotent for the same dataset", () => {
    const call = { toolName: "get_average_spending", arguments: { category: "food" } };
    expect(registry.invoke(call, dataset)).toEqual(registry.invoke(call, dataset));
  });

  test("compare_spending should give the ratio and monthly difference", () => {
    const obs = registry.invoke(
      { toolName: "compare_spending", arguments: { category1: "housing", category2: "food" } },
      dataset
    );

    expect(obs.ok).toBe(true);
    expect(obs.summary).toBe(
      "Housing: 15,234 NOK per month; Food: 6,543 NOK per month. " +
        "Housing is 2.33 times Food, a difference of 8,691 NOK per month. " +
        "Source: Statistics Norway table 10235, period 2012."
    );
    expect(obs.result).toMatchObject({ monthlyDifference: 8691 });
    expect(obs.result).toHaveProperty("ratio", 182808 / 78516);
  });

  test("compare_spending should return a null ratio when the second amount is zero", () => {
    const zeroFood = createDataset({
      tableId: "10235",
      label: "test",
      fetchedAt: 0,
      periods: ["2012"],
      categories: [
        { code: "01", label: "Food" },
        { code: "04", label: "Housing" },
      ],
      records: [
        { category: "01", categoryLabel: "Food", period: "2012", amount: 0, unit: "NOK", sourceTableId: "10235" },
        { category: "04", categoryLabel: "Housing", period: "2012", amount: 1200, unit: "NOK", sourceTableId: "10235" },
      ],
    });

    const obs = registry.invoke(
      { toolName: "compare_spending", arguments: { category1: "housing", category2: "food" } },
      zeroFood
    );

    expect(obs.result).toMatchObject({ ratio: null, monthlyDifference: 100 });
    expect(obs.summary).toContain("Food spending is zero, so no ratio can be given");
  });

  test("get_total_spending should sum every category in the period", () => {
    const obs = registry.invoke({ toolName: "get_total_spending", arguments: {} }, dataset);

    expect(obs.summary).toBe(
      "Total average household spending is 46,077 NOK per month (552,924 NOK per year) across 12 categories. " +
        "Source: Statistics Norway table 10235, period 2012."
    );
  });

  test("list_categories should include codes, labels and aliases", () => {
    const obs = registry.invoke({ toolName: "list_categories", arguments: {} }, dataset);

    expect(obs.ok).toBe(true);
    expect(obs.summary).toContain("04 Housing (housing, home)");
    expect(obs.summary).toContain("10 Education (education, school)");
  });

  test("an unknown category should become a ToolLookupError observation", () => {
    const obs = registry.invoke(
      { toolName: "get_average_spending", arguments: { category: "transportation_xyz" } },
      dataset
    );

    expect(obs).toEqual({
      toolName: "get_average_spending",
      ok: false,
      summary: 'Error: Unknown category "transportation_xyz". Use list_categories to see the accepted names.',
      error: {
        type: "ToolLookupError",
        message: 'Unknown category "transportation_xyz". Use list_categories to see the accepted names.',
      },
    });
  });

  test("a period outside the dataset should become a ToolLookupError observation", () => {
    const obs = registry.invoke({ toolName: "get_total_spending", arguments: { period: "2020" } }, dataset);

    expect(obs.error).toEqual({
      type: "ToolLookupError",
      message: 'Period "2020" is not in table 10235. Available periods: 2009, 2012',
    });
  });

  test("every successful observation should point at a record in the dataset", () => {
    const calls = [
      { toolName: "get_average_spending", arguments: { category: "transport" } },
      { toolName: "compare_spending", arguments: { category1: "07", category2: "Health", period: "2009" } },
      { toolName: "get_total_spending", arguments: {} },
      { toolName: "list_categories", arguments: {} },
    ];

    const observations: Observation[] = calls.map((call) => registry.invoke(call, dataset));

    for (const obs of observations) {
      expect(obs.ok).toBe(true);
      const provenance = obs.provenance;
      expect(
        dataset.records.some((r) => r.sourceTableId === provenance?.tableId && r.period === provenance?.period)
      ).toBe(true);
    }
  });
});

describe("ToolRegistry", () => {
  test("should resolve tool aliases case-insensitively", () => {
    const obs = spendingRegistry().invoke(
      { toolName: "Get_Spending", arguments: { category: "food" } },
      fixtureDataset()
    );

    expect(obs.toolName).toBe("get_average_spending");
    expect(obs.ok).toBe(true);
  });

  test("an unknown tool should become a ToolArgumentError observation", () => {
    const obs = spendingRegistry().invoke({ toolName: "get_weather", arguments: {} }, fixtureDataset());

    expect(obs.error?.type).toBe("ToolArgumentError");
    expect(obs.summary).toBe(
      'Error: Unknown tool "get_weather". Available tools: ' +
        "get_average_spending, compare_spending, list_categories, get_total_spending"
    );
  });

  test("should reject missing and unexpected arguments", () => {
    const registry = spendingRegistry();
    const dataset = fixtureDataset();

    const missing = registry.invoke({ toolName: "get_average_spending", arguments: {} }, dataset);
    expect(missing.error?.type).toBe("ToolArgumentError");
    expect(missing.error?.message).toContain("must have required property 'category'");

    const extra = registry.invoke(
      { toolName: "get_average_spending", arguments: { category: "food", region: "Oslo" } },
      dataset
    );
    expect(extra.error?.message).toBe('Invalid arguments for get_average_spending: unexpected argument "region"');
  });

  test("should let unexpected exceptions propagate", () => {
    const registry = new ToolRegistry();
    registry.register({
      name: "broken",
      description: "always fails",
      parameters: { type: "object", properties: {}, additionalProperties: false },
      execute: () => {
        throw new Error("boom");
      },
    });

    expect(() => registry.invoke({ toolName: "broken", arguments: {} }, fixtureDataset())).toThrow("boom");
  });

  test("should refuse a duplicate name or alias", () => {
    const registry = spendingRegistry();
    expect(() => registerSpendingTools(registry)).toThrow("Tool already registered: get_average_spending");
  });

  test("should emit invocation and result events", () => {
    const bus = new EventBus();
    const registry = registerSpendingTools(new ToolRegistry({ eventBus: bus }));

    registry.invoke({ toolName: "get_average_spending", arguments: { category: "food" } }, fixtureDataset());

    expect(bus.history.map((e) => e.type)).toEqual(["ToolInvocationEvent", "ToolResultEvent"]);
  });

  test("should describe tools with optional parameters marked", () => {
    const lines = spendingRegistry().describeForPrompt().split("\n");

    expect(lines[1]).toBe(
      "- compare_spending(category1, category2, period?): Compare average household spending between two categories."
    );
    expect(spendingRegistry().list().map(formatParameters)).toEqual([
      "category, period?",
      "category1, category2, period?",
      "",
      "period?",
    ]);
    expect(spendingRegistry().parameterOrder("compare_spending_categories")).toEqual([
      "category1",
      "category2",
      "period",
    ]);
  });
});

describe("resolveCategory", () => {
  const dataset = fixtureDataset();

  test.each([
    ["04", "04"],
    ["4", "04"],
    ["HOUSING", "04"],
    ["  dining ", "11"],
    ["Recreation and culture", "09"],
  ])("should resolve %j to %s", (input, code) => {
    expect(resolveCategory(input, dataset).code).toBe(code);
  });

  test("should throw for names it does not know", () => {
    expect(() => resolveCategory("pets", dataset)).toThrow('Unknown category "pets"');
  });
});
