/**
 * Shared test fixtures: a small household-budget table and in-process fakes.
 */

import fs from "fs";
import path from "path";
import { createDataset } from "../../src/core/data/dataset";
import { parseJsonStat } from "../../src/core/data/jsonStat";
import type { TableSource } from "../../src/core/data/tableSource";
import { ToolRegistry } from "../../src/core/tool-engine";
import { registerSpendingTools } from "../../src/core/tools/spendingTools";
import type { Dataset, DatasetProvider } from "../../src/core/types";

export const TABLE_ID = "10235";

export const PARSE_OPTIONS = {
  tableId: TABLE_ID,
  categoryDimension: "Forbruksundersok",
  periodDimension: "Tid",
  defaultUnit: "NOK",
};

export function loadPayload(): unknown {
  return JSON.parse(fs.readFileSync(path.join(__dirname, "..", "fixtures", "ssb-10235.json"), "utf8"));
}

export function fixtureDataset(fetchedAt = 0): Dataset {
  return createDataset({ tableId: TABLE_ID, fetchedAt, ...parseJsonStat(loadPayload(), PARSE_OPTIONS) });
}

/**
 * TableSource stand-in. Each call runs `respond`; `calls` counts them.
 */
export class FakeTableSource implements TableSource {
  calls = 0;

  constructor(private respond: (tableId: string) => Promise<unknown>) {}

  fetchTable(tableId: string): Promise<unknown> {
    this.calls++;
    return this.respond(tableId);
  }
}

export class StaticProvider implements DatasetProvider {
  calls = 0;

  constructor(private dataset: Dataset) {}

  async getDataset(): Promise<Dataset> {
    this.calls++;
    return this.dataset;
  }
}

export class FailingProvider implements DatasetProvider {
  calls = 0;

  constructor(private error: Error) {}

  async getDataset(): Promise<Dataset> {
    this.calls++;
    throw this.error;
  }
}

export function spendingRegistry(): ToolRegistry {
  return registerSpendingTools(new ToolRegistry());
}

export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void; reject: (e: unknown) => void } {
  let resolve: (value: T) => void = () => undefined;
  let reject: (e: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/**
 * A 200 whose body never arrives; reading it rejects once `signal` aborts.
 */
export function stalledResponse(signal: AbortSignal | null | undefined): Response {
  return Object.assign(new Response(null, { status: 200 }), {
    json: (): Promise<unknown> =>
      new Promise((_, reject) => {
        signal?.addEventListener("abort", () => reject(signal.reason), { once: true });
      }),
  });
}
