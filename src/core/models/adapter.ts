/**
 * ModelAdapter API
 * Language-model inference behind one interface; the agents only see text in, text out.
 */

import type { EventBus } from "../eventBus";
import { ModelError, ModelErrorCode } from "../errors";
import { err, ok, Result } from "../utils/result";

export interface ModelInput {
  system: string;
  prompt: string;
  /** Aborted by the caller when the step deadline passes. */
  signal?: AbortSignal;
  temperature?: number;
  maxTokens?: number;
}

export interface ModelOutput {
  content: string;
  usage?: {
    promptTokens?: number;
    completionTokens?: number;
  };
}

export interface ModelAdapter {
  readonly id: string;
  generate(input: ModelInput): Promise<Result<ModelOutput, ModelError>>;
}

export interface ModelAdapterConfig {
  maxRetries?: number;
  retryIntervals?: number[];
  eventBus?: EventBus;
}

const TRANSIENT_ERRORS: readonly ModelErrorCode[] = ["rate_limit_error", "network_error", "server_overload"];

/**
 * Base model adapter implementation with retry logic
 */
export abstract class BaseModelAdapter implements ModelAdapter {
  abstract readonly id: string;
  protected eventBus?: EventBus;
  protected maxRetries: number;
  protected retryIntervals: number[];

  constructor(config: ModelAdapterConfig = {}) {
    this.eventBus = config.eventBus;
    this.maxRetries = config.maxRetries ?? 3;
    this.retryIntervals = config.retryIntervals ?? [200, 500, 1000];
  }

  /**
   * Generate with retry logic
   */
  async generate(input: ModelInput): Promise<Result<ModelOutput, ModelError>> {
    let lastError = new ModelError("No attempt made", this.id);
    const attempts = Math.max(1, this.maxRetries);

    for (let attempt = 0; attempt < attempts; attempt++) {
      try {
        const output = await this.generateOnce(input);
        this.eventBus?.emit("ModelResponseEvent", { modelId: this.id, attempt, chars: output.content.length });
        return ok(output);
      } catch (error) {
        lastError = this.handleError(error, input.signal);
        this.eventBus?.emit("ModelErrorEvent", {
          modelId: this.id,
          attempt,
          code: lastError.reason,
          message: lastError.message,
        });

        if (!this.shouldRetry(lastError) || input.signal?.aborted || attempt === attempts - 1) {
          break;
        }

        const delay = this.retryIntervals[attempt] ?? this.retryIntervals[this.retryIntervals.length - 1] ?? 1000;
        await sleep(delay, input.signal);
      }
    }

    return err(lastError);
  }

  /**
   * Single attempt generation
   */
  protected abstract generateOnce(input: ModelInput): Promise<ModelOutput>;

  /**
   * Handle errors and convert to ModelError
   */
  protected handleError(error: unknown, signal?: AbortSignal): ModelError {
    if (error instanceof ModelError) {
      return error;
    }
    if (signal?.aborted) {
      return new ModelError("Model call aborted", this.id, "timeout_error", error);
    }
    if (error instanceof Error) {
      return new ModelError(error.message, this.id, "model_error", error);
    }
    return new ModelError("Unknown model error", this.id);
  }

  /**
   * Retry transient errors (network, rate limit, server overload)
   */
  protected shouldRetry(error: ModelError): boolean {
    return TRANSIENT_ERRORS.includes(error.reason);
  }
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (ms <= 0 || signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    }
    signal?.addEventListener("abort", done);
  });
}
