/**
 * Tool registry:
 * - register tool definitions with a JSON schema for their arguments
 * - validate calls with Ajv before execution
 * - fold argument and lookup failures into error Observations
 *
 * Tools are pure functions of (arguments, Dataset); nothing here does I/O.
 */

import Ajv, { ErrorObject, ValidateFunction } from "ajv";
import type { EventBus } from "../eventBus";
import { ToolArgumentError, ToolLookupError } from "../errors";
import { Logger, silentLogger } from "../logger";
import type { Dataset, Observation, Provenance, ToolCall } from "../types";

export interface ToolParameter {
  type: "string";
  description: string;
}

export type ToolParameterSchema = {
  type: "object";
  properties: Record<string, ToolParameter>;
  required?: string[];
  additionalProperties: false;
};

export interface ToolOutput {
  result: unknown;
  summary: string;
  provenance: Provenance;
}

export interface ToolDefinition {
  name: string;
  description: string;
  aliases?: string[];
  parameters: ToolParameterSchema;
  execute(args: Record<string, unknown>, dataset: Dataset): ToolOutput;
}

interface RegisteredTool {
  def: ToolDefinition;
  validate: ValidateFunction<Record<string, unknown>>;
}

export interface ToolRegistryOptions {
  logger?: Logger;
  eventBus?: EventBus;
}

export class ToolRegistry {
  private tools: Map<string, RegisteredTool> = new Map();
  private lookup: Map<string, string> = new Map();
  private ajv = new Ajv({ allErrors: true, coerceTypes: true });
  private logger: Logger;
  private eventBus?: EventBus;

  constructor(options: ToolRegistryOptions = {}) {
    this.logger = options.logger ?? silentLogger();
    this.eventBus = options.eventBus;
  }

  register(def: ToolDefinition): void {
    const keys = [def.name, ...(def.aliases ?? [])].map((k) => k.toLowerCase());
    for (const key of keys) {
      if (this.lookup.has(key)) throw new Error("Tool already registered: " + key);
    }

    this.tools.set(def.name, { def, validate: this.ajv.compile<Record<string, unknown>>(def.parameters) });
    for (const key of keys) this.lookup.set(key, def.name);
  }

  has(name: string): boolean {
    return this.resolve(name) !== undefined;
  }

  list(): ToolDefinition[] {
    return Array.from(this.tools.values()).map((t) => t.def);
  }

  /**
   * Parameter names in declaration order; used to map positional arguments.
   */
  parameterOrder(name: string): string[] | undefined {
    const tool = this.resolve(name);
    return tool ? Object.keys(tool.def.parameters.properties) : undefined;
  }

  /**
   * One line per tool, e.g. `- compare_spending(category1, category2, period?): ...`
   */
  describeForPrompt(): string {
    return this.list()
      .map((def) => `- ${def.name}(${formatParameters(def)}): ${def.description}`)
      .join("\n");
  }

  invoke(call: ToolCall, dataset: Dataset): Observation {
    this.eventBus?.emit("ToolInvocationEvent", { toolName: call.toolName, args: call.arguments });

    try {
      const tool = this.resolve(call.toolName);
      if (!tool) {
        throw new ToolArgumentError(
          `Unknown tool "${call.toolName}". Available tools: ${this.list().map((d) => d.name).join(", ")}`,
          { toolName: call.toolName },
          "unknown_tool"
        );
      }

      // Ajv coerces in place; keep the caller's arguments untouched
      const args: Record<string, unknown> = { ...call.arguments };
      if (!tool.validate(args)) {
        throw new ToolArgumentError(
          `Invalid arguments for ${tool.def.name}: ${formatAjvErrors(tool.validate.errors)}`,
          { toolName: tool.def.name },
          "invalid_arguments"
        );
      }

      const out = tool.def.execute(args, dataset);
      this.logger.debug({ toolName: tool.def.name, provenance: out.provenance }, "Tool executed");
      this.eventBus?.emit("ToolResultEvent", { toolName: tool.def.name, provenance: out.provenance });

      return Object.freeze({
        toolName: tool.def.name,
        ok: true,
        result: out.result,
        summary: out.summary,
        provenance: Object.freeze({ ...out.provenance }),
      });
    } catch (e) {
      if (e instanceof ToolArgumentError || e instanceof ToolLookupError) {
        const type = e instanceof ToolArgumentError ? "ToolArgumentError" : "ToolLookupError";
        this.logger.info({ toolName: call.toolName, errorType: type }, e.message);
        this.eventBus?.emit("ToolErrorEvent", { toolName: call.toolName, errorType: type, message: e.message });
        return Object.freeze({
          toolName: call.toolName,
          ok: false,
          summary: `Error: ${e.message}`,
          error: Object.freeze({ type, message: e.message }),
        });
      }
      throw e;
    }
  }

  private resolve(name: string): RegisteredTool | undefined {
    const canonical = this.lookup.get(name.trim().toLowerCase());
    return canonical === undefined ? undefined : this.tools.get(canonical);
  }
}

function formatAjvErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors || errors.length === 0) return "validation failed";
  return errors
    .map((e) => {
      if (e.keyword === "additionalProperties" && typeof e.params.additionalProperty === "string") {
        return `unexpected argument "${e.params.additionalProperty}"`;
      }
      return `${e.instancePath || "arguments"} ${e.message ?? "is invalid"}`;
    })
    .join("; ");
}

/**
 * Parameter names in declaration order, optional ones suffixed with `?`.
 */
export function formatParameters(def: ToolDefinition): string {
  const required = new Set(def.parameters.required ?? []);
  return Object.keys(def.parameters.properties)
    .map((p) => (required.has(p) ? p : `${p}?`))
    .join(", ");
}
