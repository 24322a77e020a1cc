/**
 * Scripted model adapter for tests and dry runs.
 * Replays a fixed list of replies, or asks a function for each one.
 */

import { ModelError } from "../errors";
import { BaseModelAdapter, ModelAdapterConfig, ModelInput, ModelOutput } from "./adapter";

export type ScriptedReply =
  | string
  | { error: ModelError }
  /** Resolves after `delayMs` unless the call is aborted first. */
  | { content: string; delayMs: number };

export type ScriptFn = (input: ModelInput, callIndex: number) => ScriptedReply;

export interface ScriptedAdapterConfig extends ModelAdapterConfig {
  id?: string;
}

export class ScriptedAdapter extends BaseModelAdapter {
  readonly id: string;
  readonly calls: ModelInput[] = [];
  private script: ScriptFn;

  constructor(script: ScriptedReply[] | ScriptFn, config: ScriptedAdapterConfig = {}) {
    // one attempt per reply keeps scripts aligned with model calls
    super({ maxRetries: 1, ...config });
    this.id = config.id ?? "scripted";
    if (typeof script === "function") {
      this.script = script;
    } else {
      const replies = [...script];
      this.script = (_input, i) => {
        const reply = replies[i];
        return reply ?? { error: new ModelError(`Script exhausted after ${replies.length} replies`, this.id) };
      };
    }
  }

  get callCount(): number {
    return this.calls.length;
  }

  protected async generateOnce(input: ModelInput): Promise<ModelOutput> {
    const index = this.calls.length;
    this.calls.push(input);
    const reply = this.script(input, index);

    if (typeof reply === "string") return { content: reply };
    if ("error" in reply) throw reply.error;
    return { content: await delayed(reply.content, reply.delayMs, input.signal, this.id) };
  }
}

function delayed(content: string, ms: number, signal: AbortSignal | undefined, modelId: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const aborted = (): ModelError => new ModelError("Scripted reply aborted", modelId, "timeout_error");
    if (signal?.aborted) {
      reject(aborted());
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve(content);
    }, ms);
    function onAbort(): void {
      clearTimeout(timer);
      reject(aborted());
    }
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Offline stand-in for a real model: lists the categories, then answers with the
 * last observation it was shown.
 */
export const dryRunScript: ScriptFn = (input) => {
  const observations = input.prompt.match(/^Observation: .*$/gm);
  if (!observations || observations.length === 0) {
    return "Thought: I should look up which categories the table has.\nAction: list_categories()";
  }
  const last = observations[observations.length - 1].slice("Observation: ".length);
  return `Thought: I have the figures I need.\nFinal Answer: ${last}`;
};
