export { DataStore, DEFAULT_TTL_MS } from "./dataStore";
export type { DataStoreOptions } from "./dataStore";
export { FileCacheStore, MemoryCacheStore, deserializeEntry, serializeEntry } from "./cacheStore";
export type { CacheEntry, CacheStore } from "./cacheStore";
export { createDataset, latestPeriod, DATASET_SCHEMA_VERSION } from "./dataset";
export type { DatasetParts } from "./dataset";
export { parseJsonStat, JsonStatDatasetSchema } from "./jsonStat";
export type { JsonStatParseOptions, ParsedTable } from "./jsonStat";
export { SsbTableSource, DEFAULT_SSB_CONFIG, MAIN_CATEGORY_CODES } from "./tableSource";
export type { TableSource, SsbTableSourceConfig, PxQuery } from "./tableSource";
