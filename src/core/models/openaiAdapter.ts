/**
 * OpenAI Model Adapter
 * Chat completions through the official `openai` client.
 */

import OpenAI from "openai";
import { ModelError } from "../errors";
import { BaseModelAdapter, ModelAdapterConfig, ModelInput, ModelOutput } from "./adapter";

export type ChatMessage = { role: "system"; content: string } | { role: "user"; content: string };

export interface ChatCompletionBody {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  max_tokens?: number;
}

export interface ChatCompletionResponse {
  choices: Array<{ message: { content: string | null } }>;
  usage?: { prompt_tokens: number; completion_tokens: number };
}

/**
 * The slice of the OpenAI client this adapter uses; tests pass a stand-in.
 */
export interface ChatCompletionClient {
  create(body: ChatCompletionBody, options: { signal?: AbortSignal }): Promise<ChatCompletionResponse>;
}

export interface OpenAIAdapterConfig extends ModelAdapterConfig {
  apiKey?: string;
  model?: string;
  baseURL?: string;
  client?: ChatCompletionClient;
}

export class OpenAIAdapter extends BaseModelAdapter {
  readonly id: string;
  private client: ChatCompletionClient;
  private model: string;

  constructor(config: OpenAIAdapterConfig) {
    super(config);
    this.model = config.model ?? "gpt-4o-mini";
    this.id = `openai:${this.model}`;

    if (config.client) {
      this.client = config.client;
    } else {
      if (!config.apiKey) {
        throw new Error("OpenAI API key is required");
      }
      const openai = new OpenAI({ apiKey: config.apiKey, baseURL: config.baseURL });
      this.client = {
        create: (body, options) => openai.chat.completions.create(body, options),
      };
    }
  }

  protected async generateOnce(input: ModelInput): Promise<ModelOutput> {
    const response = await this.client.create(
      {
        model: this.model,
        messages: [
          { role: "system", content: input.system },
          { role: "user", content: input.prompt },
        ],
        temperature: input.temperature ?? 0,
        ...(input.maxTokens !== undefined ? { max_tokens: input.maxTokens } : {}),
      },
      { signal: input.signal }
    );

    const choice = response.choices[0];
    if (!choice) {
      throw new ModelError("No response choice from OpenAI", this.id, "invalid_response");
    }

    return {
      content: choice.message.content ?? "",
      usage: response.usage
        ? { promptTokens: response.usage.prompt_tokens, completionTokens: response.usage.completion_tokens }
        : undefined,
    };
  }

  protected handleError(error: unknown, signal?: AbortSignal): ModelError {
    if (error instanceof ModelError) return error;
    if (signal?.aborted || error instanceof OpenAI.APIUserAbortError) {
      return new ModelError("OpenAI request aborted", this.id, "timeout_error", error);
    }
    if (error instanceof OpenAI.RateLimitError) {
      return new ModelError(error.message, this.id, "rate_limit_error", error);
    }
    if (error instanceof OpenAI.InternalServerError) {
      return new ModelError(error.message, this.id, "server_overload", error);
    }
    if (error instanceof OpenAI.APIConnectionError) {
      return new ModelError(error.message, this.id, "network_error", error);
    }
    return super.handleError(error, signal);
  }
}
