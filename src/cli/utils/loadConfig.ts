/**
 * src/cli/utils/loadConfig.ts
 *
 * household-agents.config.json (optional, in the working directory) overlaid with
 * environment variables, validated with zod.
 */

import fs from "fs";
import path from "path";
import { z } from "zod";
import { DEFAULT_TTL_MS } from "../../core/data/dataStore";
import { DEFAULT_SSB_CONFIG } from "../../core/data/tableSource";
import { ConfigError, errorMessage } from "../../core/errors";

export const CONFIG_FILE = "household-agents.config.json";

const DataSchema = z.object({
  baseUrl: z.string().url().default(DEFAULT_SSB_CONFIG.baseUrl),
  language: z.enum(["en", "no"]).default("en"),
  tableId: z
    .string()
    .regex(/^[\w-]+$/, "must contain only letters, digits, _ and -")
    .default("10235"),
  periods: z.array(z.string().min(1)).min(1).default(["2012"]),
  cacheDir: z.string().min(1).default("data/ssb_cache"),
  cacheTtlMs: z.number().int().nonnegative().default(DEFAULT_TTL_MS),
  staleFallback: z.boolean().default(true),
  fetchTimeoutMs: z.number().int().positive().default(DEFAULT_SSB_CONFIG.timeoutMs),
});

const ModelSchema = z.object({
  provider: z.enum(["ollama", "openai", "scripted"]).default("ollama"),
  ollamaUrl: z.string().url().default("http://localhost:11434"),
  ollamaModel: z.string().min(1).default("llama3.2"),
  openaiApiKey: z.string().min(1).optional(),
  openaiModel: z.string().min(1).default("gpt-4o-mini"),
});

const AgentSchema = z.object({
  maxIterations: z.number().int().positive().default(6),
  stepTimeoutMs: z.number().int().positive().default(60_000),
});

const LoggerSchema = z.object({
  level: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  format: z.enum(["json", "pretty"]).default("json"),
});

export const HouseholdAgentsConfigSchema = z.object({
  data: DataSchema.default({}),
  model: ModelSchema.default({}),
  agent: AgentSchema.default({}),
  logger: LoggerSchema.default({}),
});

export type HouseholdAgentsConfig = z.infer<typeof HouseholdAgentsConfigSchema>;

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Explicit config file; defaults to `<cwd>/household-agents.config.json`. */
  file?: string;
}

type Section = Record<string, unknown>;

export function loadConfig(options: LoadConfigOptions = {}): HouseholdAgentsConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const file = options.file ? path.resolve(cwd, options.file) : path.join(cwd, CONFIG_FILE);

  const fromFile = readConfigFile(file, options.file !== undefined);
  const fromEnv = envOverrides(env);

  const merged: Record<string, Section> = {};
  for (const key of ["data", "model", "agent", "logger"]) {
    merged[key] = { ...section(fromFile, key), ...fromEnv[key] };
  }

  const parsed = HouseholdAgentsConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue ? issue.path.join(".") : "";
    throw new ConfigError(`Invalid configuration at ${field || "(root)"}: ${issue?.message ?? "invalid"}`, field);
  }
  return parsed.data;
}

function readConfigFile(file: string, required: boolean): Section {
  if (!fs.existsSync(file)) {
    if (required) throw new ConfigError(`Config file not found: ${file}`, "file");
    return {};
  }

  let json: unknown;
  try {
    json = JSON.parse(fs.readFileSync(file, "utf8"));
  } catch (e) {
    throw new ConfigError(`Config file ${file} is not valid JSON: ${errorMessage(e)}`, "file", e);
  }
  if (!isSection(json)) {
    throw new ConfigError(`Config file ${file} must contain a JSON object`, "file");
  }
  return json;
}

function section(source: Section, key: string): Section {
  const value = source[key];
  if (value === undefined) return {};
  if (!isSection(value)) {
    throw new ConfigError(`Invalid configuration at ${key}: expected an object`, key);
  }
  return value;
}

function isSection(value: unknown): value is Section {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Environment variables by config section. Values that do not convert are passed
 * through as strings so validation names the field they belong to.
 */
function envOverrides(env: NodeJS.ProcessEnv): Record<string, Section> {
  const out: Record<string, Section> = { data: {}, model: {}, agent: {}, logger: {} };
  const set = (sectionKey: string, field: string, value: unknown): void => {
    if (value !== undefined) out[sectionKey][field] = value;
  };

  set("data", "baseUrl", env.SSB_BASE_URL);
  set("data", "tableId", env.SSB_TABLE_ID);
  set("data", "periods", env.SSB_PERIODS === undefined ? undefined : splitList(env.SSB_PERIODS));
  set("data", "cacheDir", env.CACHE_DIR);
  set("data", "cacheTtlMs", toNumber(env.CACHE_TTL_MS));
  set("data", "staleFallback", toBoolean(env.STALE_FALLBACK));
  set("data", "fetchTimeoutMs", toNumber(env.FETCH_TIMEOUT_MS));
  set("model", "provider", env.MODEL_PROVIDER);
  set("model", "ollamaUrl", env.OLLAMA_URL);
  set("model", "ollamaModel", env.OLLAMA_MODEL);
  set("model", "openaiApiKey", env.OPENAI_API_KEY);
  set("model", "openaiModel", env.OPENAI_MODEL);
  set("agent", "maxIterations", toNumber(env.MAX_ITERATIONS));
  set("agent", "stepTimeoutMs", toNumber(env.STEP_TIMEOUT_MS));
  set("logger", "level", env.LOG_LEVEL);
  set("logger", "format", env.LOG_FORMAT);
  return out;
}

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((v) => v.trim())
    .filter((v) => v !== "");
}

function toNumber(value: string | undefined): number | string | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : value;
}

function toBoolean(value: string | undefined): boolean | string | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const v = value.trim().toLowerCase();
  if (["true", "1", "yes", "on"].includes(v)) return true;
  if (["false", "0", "no", "off"].includes(v)) return false;
  return value;
}
