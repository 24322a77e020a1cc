/**
 * Ollama Model Adapter
 * Local inference through Ollama's /api/generate (non-streaming).
 */

import { z } from "zod";
import { ModelError, errorMessage } from "../errors";
import { BaseModelAdapter, ModelAdapterConfig, ModelInput, ModelOutput } from "./adapter";

export interface OllamaAdapterConfig extends ModelAdapterConfig {
  baseURL?: string; // default: http://localhost:11434
  model?: string; // default: llama3.2
}

interface OllamaRequest {
  model: string;
  system: string;
  prompt: string;
  stream: false;
  options: {
    temperature: number;
    num_predict?: number;
  };
}

const OllamaResponseSchema = z.object({
  model: z.string().optional(),
  response: z.string(),
  done: z.boolean().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

export class OllamaAdapter extends BaseModelAdapter {
  readonly id: string;
  private baseURL: string;
  private model: string;

  constructor(config: OllamaAdapterConfig = {}) {
    super(config);
    this.baseURL = (config.baseURL ?? "http://localhost:11434").replace(/\/+$/, "");
    this.model = config.model ?? "llama3.2";
    this.id = `ollama:${this.model}`;
  }

  protected async generateOnce(input: ModelInput): Promise<ModelOutput> {
    const body: OllamaRequest = {
      model: this.model,
      system: input.system,
      prompt: input.prompt,
      stream: false,
      options: {
        temperature: input.temperature ?? 0,
        ...(input.maxTokens !== undefined ? { num_predict: input.maxTokens } : {}),
      },
    };

    let response: Response;
    try {
      response = await fetch(`${this.baseURL}/api/generate`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
        signal: input.signal,
      });
    } catch (e) {
      if (input.signal?.aborted) {
        throw new ModelError("Ollama request aborted", this.id, "timeout_error", e);
      }
      throw new ModelError(`Ollama unreachable at ${this.baseURL}: ${errorMessage(e)}`, this.id, "network_error", e);
    }

    if (!response.ok) {
      const text = await response.text().catch(() => "");
      const reason = response.status === 429 ? "rate_limit_error" : response.status >= 500 ? "server_overload" : "model_error";
      throw new ModelError(`Ollama API error: ${response.status} ${response.statusText} ${text}`.trim(), this.id, reason);
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch (e) {
      throw new ModelError("Ollama returned invalid JSON", this.id, "invalid_response", e);
    }

    const parsed = OllamaResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new ModelError("Ollama response is missing the generated text", this.id, "invalid_response");
    }

    return {
      content: parsed.data.response,
      usage: {
        promptTokens: parsed.data.prompt_eval_count,
        completionTokens: parsed.data.eval_count,
      },
    };
  }
}
