/**
 * Single-step baseline: one prompt, at most one tool call, then an answer.
 * No retries and no corrective re-prompting.
 */

import { ulid } from "ulid";
import type { EventBus } from "../eventBus";
import { errorMessage } from "../errors";
import { Logger, silentLogger } from "../logger";
import type { ModelAdapter } from "../models";
import type { ToolRegistry } from "../tool-engine";
import type { Agent, AgentFailure, AgentResult, Dataset, DatasetProvider } from "../types";
import { callModel, dataFailure, isTimeout, ModelStep } from "./modelStep";
import { baselineFollowUpPrompt, baselinePrompt, baselineSystemPrompt } from "./prompts";
import { parseModelReply } from "./reactParser";
import { DEFAULT_STEP_TIMEOUT_MS } from "./reactAgent";
import { TraceRecorder } from "./traceRecorder";

export interface BaselineAgentOptions {
  model: ModelAdapter;
  tools: ToolRegistry;
  data: DatasetProvider;
  tableId: string;
  stepTimeoutMs?: number;
  logger?: Logger;
  eventBus?: EventBus;
}

export class BaselineAgent implements Agent {
  readonly kind = "baseline" as const;
  private model: ModelAdapter;
  private tools: ToolRegistry;
  private data: DatasetProvider;
  private tableId: string;
  private stepTimeoutMs: number;
  private logger: Logger;
  private eventBus?: EventBus;

  constructor(options: BaselineAgentOptions) {
    this.model = options.model;
    this.tools = options.tools;
    this.data = options.data;
    this.tableId = options.tableId;
    this.stepTimeoutMs = options.stepTimeoutMs ?? DEFAULT_STEP_TIMEOUT_MS;
    this.logger = options.logger ?? silentLogger();
    this.eventBus = options.eventBus;
  }

  async answer(question: string): Promise<AgentResult> {
    const start = Date.now();
    const runId = ulid();
    let iteration = 0;
    let toolCalls = 0;
    const recorder = new TraceRecorder((step) =>
      this.eventBus?.emit("AgentStepEvent", { runId, agent: this.kind, iteration, step })
    );

    this.logger.info({ runId, question }, "Baseline run started");
    this.eventBus?.emit("AgentStartEvent", { runId, agent: this.kind, question });

    let finalText = "";
    let failure: AgentFailure | undefined;
    try {
      const system = baselineSystemPrompt(this.tools.describeForPrompt());
      iteration++;
      const first = await callModel(this.model, { system, prompt: baselinePrompt(question) }, this.stepTimeoutMs);
      failure = this.modelFailure(first, recorder);

      if (first.ok) {
        const reply = parseModelReply(first.text, { parameterOrder: (name) => this.tools.parameterOrder(name) });
        if (reply.thought) recorder.thought(reply.thought);

        if (reply.kind === "action") {
          recorder.action(reply.call);
          let dataset: Dataset | undefined;
          try {
            dataset = await this.data.getDataset(this.tableId);
          } catch (e) {
            failure = dataFailure(e);
            if (!failure) throw e;
          }

          if (dataset) {
            recorder.observation(this.tools.invoke(reply.call, dataset));
            toolCalls++;

            iteration++;
            const second = await callModel(
              this.model,
              { system, prompt: baselineFollowUpPrompt(question, recorder.render()) },
              this.stepTimeoutMs
            );
            failure = this.modelFailure(second, recorder);
            if (second.ok) {
              const followUp = parseModelReply(second.text);
              finalText = followUp.kind === "final" ? followUp.answer : second.text.trim();
            }
          }
        } else {
          finalText = reply.kind === "final" ? reply.answer : first.text.trim();
        }

        if (!failure) {
          if (finalText === "") {
            failure = { reason: "parse_failure", message: "Model reply contained no answer" };
          } else {
            recorder.finalAnswer(finalText);
          }
        }
      }
    } catch (e) {
      this.logger.error({ runId, err: e }, "Baseline run aborted by an unexpected error");
      failure = { reason: "unexpected_error", message: errorMessage(e) };
    }

    const result: AgentResult = {
      runId,
      agent: this.kind,
      question,
      finalText: failure ? "" : finalText,
      trace: recorder.finalize(),
      iterationCount: iteration,
      toolCallCount: toolCalls,
      status: failure ? "failed" : "concluded",
      failure,
      durationMs: Date.now() - start,
    };

    this.logger.info({ runId, status: result.status, failure: failure?.reason }, "Baseline run finished");
    this.eventBus?.emit("AgentFinishEvent", {
      runId,
      agent: this.kind,
      status: result.status,
      iterationCount: result.iterationCount,
      durationMs: result.durationMs,
      failure,
    });
    return result;
  }

  private modelFailure(step: ModelStep, recorder: TraceRecorder): AgentFailure | undefined {
    if (step.ok) return undefined;
    if (isTimeout(step.error)) {
      recorder.error("timeout", step.error.message);
      return { reason: "timeout", message: step.error.message };
    }
    return { reason: "model_error", message: step.error.message };
  }
}
