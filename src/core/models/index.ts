import type { EventBus } from "../eventBus";
import type { ModelAdapter } from "./adapter";
import { dryRunScript, ScriptedAdapter } from "./mockAdapter";
import { OllamaAdapter } from "./ollamaAdapter";
import { OpenAIAdapter } from "./openaiAdapter";

export { BaseModelAdapter } from "./adapter";
export type { ModelAdapter, ModelAdapterConfig, ModelInput, ModelOutput } from "./adapter";
export { OllamaAdapter } from "./ollamaAdapter";
export type { OllamaAdapterConfig } from "./ollamaAdapter";
export { OpenAIAdapter } from "./openaiAdapter";
export type {
  ChatCompletionBody,
  ChatCompletionClient,
  ChatCompletionResponse,
  OpenAIAdapterConfig,
} from "./openaiAdapter";
export { ScriptedAdapter, dryRunScript } from "./mockAdapter";
export type { ScriptedReply, ScriptFn } from "./mockAdapter";

export type ModelProvider = "ollama" | "openai" | "scripted";

export interface ModelSettings {
  provider: ModelProvider;
  ollamaUrl: string;
  ollamaModel: string;
  openaiApiKey?: string;
  openaiModel: string;
}

export function createModelAdapter(settings: ModelSettings, eventBus?: EventBus): ModelAdapter {
  switch (settings.provider) {
    case "ollama":
      return new OllamaAdapter({ baseURL: settings.ollamaUrl, model: settings.ollamaModel, eventBus });
    case "openai":
      return new OpenAIAdapter({ apiKey: settings.openaiApiKey, model: settings.openaiModel, eventBus });
    case "scripted":
      return new ScriptedAdapter(dryRunScript, { id: "dry-run", eventBus });
  }
}
