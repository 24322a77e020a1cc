/**
 * Cache persistence for Datasets.
 * Entries are written whole (temp file + rename), so a reader sees either the
 * previous file or the new one, never a partial write.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { z } from "zod";
import { ParseError } from "../errors";
import type { Dataset } from "../types";
import { createDataset, DATASET_SCHEMA_VERSION, DatasetSchema } from "./dataset";

export interface CacheEntry {
  schemaVersion: number;
  tableId: string;
  fetchedAt: number;
  ttlMs: number;
  dataset: Dataset;
}

export interface CacheStore {
  read(tableId: string): Promise<CacheEntry | undefined>;
  write(entry: CacheEntry): Promise<void>;
}

const CacheEntrySchema = z.object({
  schemaVersion: z.number().int(),
  tableId: z.string(),
  fetchedAt: z.number(),
  ttlMs: z.number(),
  dataset: DatasetSchema,
});

/**
 * Decode a serialized entry. Returns undefined for entries written by another
 * schema version; throws ParseError for anything unreadable.
 */
export function deserializeEntry(raw: string, tableId: string): CacheEntry | undefined {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    throw new ParseError(`Cache entry for table ${tableId} is not valid JSON`, { tableId }, e);
  }

  const parsed = CacheEntrySchema.safeParse(json);
  if (!parsed.success) {
    throw new ParseError(`Cache entry for table ${tableId} has an unexpected shape`, { tableId });
  }

  const entry = parsed.data;
  if (entry.schemaVersion !== DATASET_SCHEMA_VERSION || entry.dataset.schemaVersion !== DATASET_SCHEMA_VERSION) {
    return undefined;
  }

  return {
    schemaVersion: entry.schemaVersion,
    tableId: entry.tableId,
    fetchedAt: entry.fetchedAt,
    ttlMs: entry.ttlMs,
    dataset: createDataset(entry.dataset),
  };
}

export function serializeEntry(entry: CacheEntry): string {
  return JSON.stringify(entry, null, 2);
}

/**
 * In-process cache. Stores serialized text so reads hand out fresh objects,
 * the same as the file store.
 */
export class MemoryCacheStore implements CacheStore {
  private entries: Map<string, string> = new Map();

  async read(tableId: string): Promise<CacheEntry | undefined> {
    const raw = this.entries.get(tableId);
    return raw === undefined ? undefined : deserializeEntry(raw, tableId);
  }

  async write(entry: CacheEntry): Promise<void> {
    this.entries.set(entry.tableId, serializeEntry(entry));
  }

  has(tableId: string): boolean {
    return this.entries.has(tableId);
  }
}

/**
 * One JSON file per table under `dir`: `<dir>/<tableId>.json`.
 */
export class FileCacheStore implements CacheStore {
  private dir: string;

  constructor(dir: string) {
    this.dir = path.resolve(dir);
  }

  pathFor(tableId: string): string {
    if (!/^[\w-]+$/.test(tableId)) {
      throw new ParseError(`Invalid table id for cache path: ${tableId}`, { tableId });
    }
    return path.join(this.dir, `${tableId}.json`);
  }

  async read(tableId: string): Promise<CacheEntry | undefined> {
    let raw: string;
    try {
      raw = await fs.readFile(this.pathFor(tableId), "utf-8");
    } catch (e) {
      if (isNotFound(e)) return undefined;
      throw e;
    }
    return deserializeEntry(raw, tableId);
  }

  async write(entry: CacheEntry): Promise<void> {
    const target = this.pathFor(entry.tableId);
    const tmp = `${target}.${process.pid}.${Date.now()}.tmp`;
    await fs.mkdir(this.dir, { recursive: true });
    try {
      await fs.writeFile(tmp, serializeEntry(entry), "utf-8");
      await fs.rename(tmp, target);
    } catch (e) {
      await fs.rm(tmp, { force: true });
      throw e;
    }
  }
}

function isNotFound(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}
