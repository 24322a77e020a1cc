/**
 * Remote source for statistics tables: Statistics Norway's PxWebApi (v0).
 * Queries are POSTed as JSON and answered in JSON-stat 2.0.
 */

import { FetchError, ParseError, TimeoutError, errorMessage } from "../errors";

export interface TableSource {
  fetchTable(tableId: string): Promise<unknown>;
}

export interface PxSelection {
  code: string;
  selection: { filter: "item"; values: string[] };
}

export interface PxQuery {
  query: PxSelection[];
  response: { format: "json-stat2" };
}

export interface SsbTableSourceConfig {
  baseUrl: string;
  language: "en" | "no";
  timeoutMs: number;
  categoryDimension: string;
  categoryCodes: string[];
  periodDimension: string;
  periods: string[];
  contentsDimension: string;
  contentsCode: string;
}

/** Main household-budget categories (COICOP 01-12). */
export const MAIN_CATEGORY_CODES = ["01", "02", "03", "04", "05", "06", "07", "08", "09", "10", "11", "12"];

export const DEFAULT_SSB_CONFIG: SsbTableSourceConfig = {
  baseUrl: "https://data.ssb.no/api/v0",
  language: "en",
  timeoutMs: 15_000,
  categoryDimension: "Forbruksundersok",
  categoryCodes: MAIN_CATEGORY_CODES,
  periodDimension: "Tid",
  periods: ["2012"],
  contentsDimension: "ContentsCode",
  contentsCode: "Utgift",
};

export class SsbTableSource implements TableSource {
  private config: SsbTableSourceConfig;

  constructor(config: Partial<SsbTableSourceConfig> = {}) {
    this.config = { ...DEFAULT_SSB_CONFIG, ...config };
  }

  buildQuery(): PxQuery {
    const { categoryDimension, categoryCodes, contentsDimension, contentsCode, periodDimension, periods } = this.config;
    return {
      query: [
        { code: categoryDimension, selection: { filter: "item", values: [...categoryCodes] } },
        { code: contentsDimension, selection: { filter: "item", values: [contentsCode] } },
        { code: periodDimension, selection: { filter: "item", values: [...periods] } },
      ],
      response: { format: "json-stat2" },
    };
  }

  urlFor(tableId: string): string {
    const base = this.config.baseUrl.replace(/\/+$/, "");
    return `${base}/${this.config.language}/table/${encodeURIComponent(tableId)}`;
  }

  async fetchTable(tableId: string): Promise<unknown> {
    const url = this.urlFor(tableId);
    const { timeoutMs } = this.config;
    // covers the body read as well as the request
    const signal = AbortSignal.timeout(timeoutMs);
    const timedOut = (): FetchError =>
      new FetchError(
        `Request for table ${tableId} timed out after ${timeoutMs}ms`,
        { tableId, url },
        new TimeoutError(`fetch ${url}`, timeoutMs)
      );

    let response: Response;
    try {
      response = await fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json", Accept: "application/json" },
        body: JSON.stringify(this.buildQuery()),
        signal,
      });
    } catch (e) {
      if (signal.aborted || isAbort(e)) throw timedOut();
      throw new FetchError(`Request for table ${tableId} failed: ${errorMessage(e)}`, { tableId, url }, e);
    }

    if (!response.ok) {
      throw new FetchError(`SSB API answered ${response.status} ${response.statusText} for table ${tableId}`, {
        tableId,
        url,
        status: response.status,
      });
    }

    try {
      return await response.json();
    } catch (e) {
      if (signal.aborted || isAbort(e)) throw timedOut();
      throw new ParseError(`Response for table ${tableId} is not valid JSON`, { tableId, url }, e);
    }
  }
}

function isAbort(e: unknown): boolean {
  return e instanceof Error && (e.name === "TimeoutError" || e.name === "AbortError");
}
