/**
 * Wires the core components from a loaded configuration.
 */

import path from "path";
import { BaselineAgent } from "../../core/agent/baselineAgent";
import { ReactAgent } from "../../core/agent/reactAgent";
import { CacheStore, FileCacheStore } from "../../core/data/cacheStore";
import { DataStore } from "../../core/data/dataStore";
import { SsbTableSource, TableSource } from "../../core/data/tableSource";
import { EventBus } from "../../core/eventBus";
import { Logger } from "../../core/logger";
import { createModelAdapter, ModelAdapter } from "../../core/models";
import { ToolRegistry } from "../../core/tool-engine";
import { registerSpendingTools } from "../../core/tools/spendingTools";
import type { Agent, AgentKind } from "../../core/types";
import type { HouseholdAgentsConfig } from "./loadConfig";

export interface Runtime {
  config: HouseholdAgentsConfig;
  eventBus: EventBus;
  logger: Logger;
  dataStore: DataStore;
  tools: ToolRegistry;
  model: ModelAdapter;
  agent(kind: AgentKind): Agent;
  agents(): Agent[];
}

export interface RuntimeOverrides {
  model?: ModelAdapter;
  source?: TableSource;
  cache?: CacheStore;
  eventBus?: EventBus;
  cwd?: string;
}

export type RuntimeFactory = () => Runtime;

export function createRuntime(config: HouseholdAgentsConfig, overrides: RuntimeOverrides = {}): Runtime {
  const eventBus = overrides.eventBus ?? new EventBus({ maxHistorySize: 5000 });
  const logConfig = { level: config.logger.level, format: config.logger.format };
  const logger = Logger.forSource("cli", logConfig, eventBus);
  const { data, agent: agentConfig } = config;

  const dataStore = new DataStore({
    source:
      overrides.source ??
      new SsbTableSource({
        baseUrl: data.baseUrl,
        language: data.language,
        periods: data.periods,
        timeoutMs: data.fetchTimeoutMs,
      }),
    cache: overrides.cache ?? new FileCacheStore(path.resolve(overrides.cwd ?? process.cwd(), data.cacheDir)),
    ttlMs: data.cacheTtlMs,
    staleFallback: data.staleFallback,
    logger: Logger.forSource("data-store", logConfig, eventBus),
    eventBus,
  });

  const tools = registerSpendingTools(
    new ToolRegistry({ logger: Logger.forSource("tool-registry", logConfig, eventBus), eventBus })
  );
  const model = overrides.model ?? createModelAdapter({ ...config.model }, eventBus);

  const react = new ReactAgent({
    model,
    tools,
    data: dataStore,
    tableId: data.tableId,
    maxIterations: agentConfig.maxIterations,
    stepTimeoutMs: agentConfig.stepTimeoutMs,
    logger: Logger.forSource("react-agent", logConfig, eventBus),
    eventBus,
  });
  const baseline = new BaselineAgent({
    model,
    tools,
    data: dataStore,
    tableId: data.tableId,
    stepTimeoutMs: agentConfig.stepTimeoutMs,
    logger: Logger.forSource("baseline-agent", logConfig, eventBus),
    eventBus,
  });

  return {
    config,
    eventBus,
    logger,
    dataStore,
    tools,
    model,
    agent: (kind) => (kind === "react" ? react : baseline),
    agents: () => [baseline, react],
  };
}
