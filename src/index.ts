/**
 * household-agents public API
 */

export * from "./core/types";
export * from "./core/errors";
export { EventBus } from "./core/eventBus";
export type { EventEnvelope, EventPayloads, EventType, Listener } from "./core/eventBus";
export * from "./core/logger";
export * from "./core/data";
export { ToolRegistry, formatParameters } from "./core/tool-engine";
export type { ToolDefinition, ToolOutput, ToolParameterSchema, ToolRegistryOptions } from "./core/tool-engine";
export * from "./core/tools";
export * from "./core/models";
export * from "./core/agent";
export { runEvaluation, summarize, loadQuestions, isGrounded } from "./core/evaluation/runner";
export type { AgentSummary, EvaluationReport } from "./core/evaluation/runner";
export { loadConfig, HouseholdAgentsConfigSchema } from "./cli/utils/loadConfig";
export type { HouseholdAgentsConfig, LoadConfigOptions } from "./cli/utils/loadConfig";
export { createRuntime } from "./cli/utils/runtime";
export type { Runtime, RuntimeOverrides } from "./cli/utils/runtime";
export { ok, err } from "./core/utils/result";
export type { Result } from "./core/utils/result";
