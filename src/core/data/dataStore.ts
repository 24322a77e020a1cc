/**
 * DataStore: fetch, parse and cache statistics tables.
 *
 * Lookup order is memory, then disk, then network. A refresh builds a whole new
 * frozen Dataset and swaps the reference; readers holding the previous one keep it.
 */

import type { EventBus } from "../eventBus";
import { FetchError, errorMessage } from "../errors";
import { Logger, silentLogger } from "../logger";
import type { Dataset, DatasetProvider } from "../types";
import type { CacheEntry, CacheStore } from "./cacheStore";
import { createDataset, DATASET_SCHEMA_VERSION } from "./dataset";
import { parseJsonStat } from "./jsonStat";
import type { TableSource } from "./tableSource";

export const DEFAULT_TTL_MS = 7 * 24 * 60 * 60 * 1000;

export interface DataStoreOptions {
  source: TableSource;
  cache?: CacheStore;
  ttlMs?: number;
  /** Serve an expired entry when the remote source fails. */
  staleFallback?: boolean;
  categoryDimension?: string;
  periodDimension?: string;
  defaultUnit?: string;
  now?: () => number;
  logger?: Logger;
  eventBus?: EventBus;
}

export class DataStore implements DatasetProvider {
  private source: TableSource;
  private cache?: CacheStore;
  private ttlMs: number;
  private staleFallback: boolean;
  private categoryDimension: string;
  private periodDimension: string;
  private defaultUnit: string;
  private now: () => number;
  private logger: Logger;
  private eventBus?: EventBus;

  private entries: Map<string, CacheEntry> = new Map();
  private inflight: Map<string, Promise<Dataset>> = new Map();

  constructor(options: DataStoreOptions) {
    this.source = options.source;
    this.cache = options.cache;
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
    this.staleFallback = options.staleFallback ?? true;
    this.categoryDimension = options.categoryDimension ?? "Forbruksundersok";
    this.periodDimension = options.periodDimension ?? "Tid";
    this.defaultUnit = options.defaultUnit ?? "NOK";
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger();
    this.eventBus = options.eventBus;
  }

  async getDataset(tableId: string): Promise<Dataset> {
    const cached = this.entries.get(tableId);
    if (cached && this.isFresh(cached)) {
      this.eventBus?.emit("DatasetCacheHitEvent", { tableId, layer: "memory", fetchedAt: cached.fetchedAt });
      return cached.dataset;
    }

    const onDisk = await this.readCache(tableId);
    if (onDisk && this.isFresh(onDisk)) {
      this.entries.set(tableId, onDisk);
      this.logger.debug({ tableId, fetchedAt: onDisk.fetchedAt }, "Dataset loaded from disk cache");
      this.eventBus?.emit("DatasetCacheHitEvent", { tableId, layer: "disk", fetchedAt: onDisk.fetchedAt });
      return onDisk.dataset;
    }

    const stale = pickNewest(cached, onDisk);
    try {
      return await this.refresh(tableId);
    } catch (e) {
      if (e instanceof FetchError && stale && this.staleFallback) {
        const ageMs = this.now() - stale.fetchedAt;
        this.logger.warn({ tableId, ageMs, err: e }, "Remote fetch failed, serving stale dataset");
        this.eventBus?.emit("DatasetStaleServedEvent", {
          tableId,
          fetchedAt: stale.fetchedAt,
          ageMs,
          error: e.message,
        });
        this.entries.set(tableId, stale);
        return stale.dataset;
      }
      throw e;
    }
  }

  /**
   * Fetch from the remote source regardless of freshness. Concurrent calls for the
   * same table share one request.
   */
  refresh(tableId: string): Promise<Dataset> {
    const pending = this.inflight.get(tableId);
    if (pending) return pending;

    const promise = this.fetchAndStore(tableId).finally(() => {
      this.inflight.delete(tableId);
    });
    this.inflight.set(tableId, promise);
    return promise;
  }

  peek(tableId: string): Dataset | undefined {
    return this.entries.get(tableId)?.dataset;
  }

  clear(): void {
    this.entries.clear();
  }

  private async fetchAndStore(tableId: string): Promise<Dataset> {
    this.logger.info({ tableId }, "Fetching table");
    const payload = await this.source.fetchTable(tableId);

    const table = parseJsonStat(payload, {
      tableId,
      categoryDimension: this.categoryDimension,
      periodDimension: this.periodDimension,
      defaultUnit: this.defaultUnit,
    });

    const fetchedAt = this.now();
    const dataset = createDataset({ tableId, fetchedAt, ...table });
    const entry: CacheEntry = {
      schemaVersion: DATASET_SCHEMA_VERSION,
      tableId,
      fetchedAt,
      ttlMs: this.ttlMs,
      dataset,
    };

    await this.writeCache(entry);
    this.entries.set(tableId, entry);

    this.logger.info({ tableId, records: dataset.records.length }, "Table fetched");
    this.eventBus?.emit("DatasetFetchedEvent", { tableId, records: dataset.records.length, fetchedAt });
    return dataset;
  }

  private isFresh(entry: CacheEntry): boolean {
    return this.now() - entry.fetchedAt < this.ttlMs;
  }

  private async readCache(tableId: string): Promise<CacheEntry | undefined> {
    if (!this.cache) return undefined;
    try {
      return await this.cache.read(tableId);
    } catch (e) {
      this.logger.warn({ tableId, error: errorMessage(e) }, "Unreadable cache entry ignored");
      return undefined;
    }
  }

  private async writeCache(entry: CacheEntry): Promise<void> {
    if (!this.cache) return;
    try {
      await this.cache.write(entry);
    } catch (e) {
      this.logger.warn({ tableId: entry.tableId, error: errorMessage(e) }, "Failed to persist dataset cache");
    }
  }
}

function pickNewest(a?: CacheEntry, b?: CacheEntry): CacheEntry | undefined {
  if (!a) return b;
  if (!b) return a;
  return b.fetchedAt > a.fetchedAt ? b : a;
}
