/**
 * Pieces shared by both agents: a deadline-bound model call and the mapping from
 * data-layer errors to a run failure.
 */

import { FetchError, ModelError, ParseError, TimeoutError } from "../errors";
import type { ModelAdapter } from "../models";
import type { AgentFailure } from "../types";
import { withTimeout } from "./withTimeout";

export type ModelStep = { ok: true; text: string } | { ok: false; error: ModelError | TimeoutError };

export async function callModel(
  model: ModelAdapter,
  input: { system: string; prompt: string },
  stepTimeoutMs: number
): Promise<ModelStep> {
  try {
    const result = await withTimeout(
      (signal) => model.generate({ system: input.system, prompt: input.prompt, signal, temperature: 0 }),
      stepTimeoutMs,
      "Model call"
    );
    return result.ok ? { ok: true, text: result.value.content } : { ok: false, error: result.error };
  } catch (e) {
    if (e instanceof TimeoutError) return { ok: false, error: e };
    throw e;
  }
}

export function isTimeout(error: ModelError | TimeoutError): boolean {
  return error instanceof TimeoutError || error.reason === "timeout_error";
}

/**
 * Failure for an error raised while loading the dataset, or undefined when the
 * error is not a data-layer error.
 */
export function dataFailure(error: unknown): AgentFailure | undefined {
  if (error instanceof FetchError || error instanceof ParseError) {
    return { reason: "data_unavailable", message: error.message };
  }
  return undefined;
}
