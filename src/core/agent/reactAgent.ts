/**
 * ReAct agent: Thought -> Action -> Observation until a final answer.
 *
 * The loop is an explicit state machine:
 *
 *   thinking --final--> concluded
 *   thinking --action--> acting --> observing --> thinking
 *   thinking / acting --unrecoverable--> failed
 *
 * An iteration is one model call. Two recoverable failures in a row (unparseable
 * reply, step timeout) end the run, as does reaching maxIterations. `answer`
 * never throws; a failed run returns the partial trace.
 */

import { ulid } from "ulid";
import type { EventBus } from "../eventBus";
import { IterationLimitExceeded, errorMessage } from "../errors";
import { Logger, silentLogger } from "../logger";
import type { ModelAdapter } from "../models";
import type { ToolRegistry } from "../tool-engine";
import type {
  Agent,
  AgentFailure,
  AgentResult,
  Dataset,
  DatasetProvider,
  Observation,
  ReasoningStep,
  ToolCall,
} from "../types";
import { callModel, dataFailure, isTimeout } from "./modelStep";
import { parseCorrection, reactPrompt, reactSystemPrompt, TIMEOUT_CORRECTION } from "./prompts";
import { parseModelReply } from "./reactParser";
import { TraceRecorder } from "./traceRecorder";

export const DEFAULT_MAX_ITERATIONS = 6;
export const DEFAULT_STEP_TIMEOUT_MS = 60_000;
const MAX_CONSECUTIVE_FAILURES = 2;

export type LoopState = "thinking" | "acting" | "observing" | "concluded" | "failed";

export interface ReactAgentOptions {
  model: ModelAdapter;
  tools: ToolRegistry;
  data: DatasetProvider;
  tableId: string;
  maxIterations?: number;
  stepTimeoutMs?: number;
  /** Token budget for the rendered trace inside each prompt. */
  maxPromptTokens?: number;
  logger?: Logger;
  eventBus?: EventBus;
}

/**
 * Per-question state; one instance per `answer` call.
 */
interface Run {
  runId: string;
  question: string;
  recorder: TraceRecorder;
  iteration: number;
  toolCalls: number;
  consecutiveFailures: number;
  correction?: string;
  pending?: ToolCall;
  observation?: Observation;
  dataset?: Dataset;
  finalText: string;
  failure?: AgentFailure;
}

export class ReactAgent implements Agent {
  readonly kind = "react" as const;
  private model: ModelAdapter;
  private tools: ToolRegistry;
  private data: DatasetProvider;
  private tableId: string;
  private maxIterations: number;
  private stepTimeoutMs: number;
  private maxPromptTokens: number;
  private logger: Logger;
  private eventBus?: EventBus;

  constructor(options: ReactAgentOptions) {
    this.model = options.model;
    this.tools = options.tools;
    this.data = options.data;
    this.tableId = options.tableId;
    this.maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    this.stepTimeoutMs = options.stepTimeoutMs ?? DEFAULT_STEP_TIMEOUT_MS;
    this.maxPromptTokens = options.maxPromptTokens ?? 3000;
    this.logger = options.logger ?? silentLogger();
    this.eventBus = options.eventBus;
  }

  async answer(question: string): Promise<AgentResult> {
    const start = Date.now();
    const runId = ulid();
    const run: Run = {
      runId,
      question,
      recorder: new TraceRecorder((step) => this.onStep(run, step)),
      iteration: 0,
      toolCalls: 0,
      consecutiveFailures: 0,
      finalText: "",
    };

    this.logger.info({ runId, question }, "ReAct run started");
    this.eventBus?.emit("AgentStartEvent", { runId, agent: this.kind, question });

    let state: LoopState = "thinking";
    try {
      while (state !== "concluded" && state !== "failed") {
        switch (state) {
          case "thinking":
            state = await this.think(run);
            break;
          case "acting":
            state = await this.act(run);
            break;
          case "observing":
            state = this.observe(run);
            break;
        }
      }
    } catch (e) {
      this.logger.error({ runId, err: e }, "ReAct run aborted by an unexpected error");
      run.failure = { reason: "unexpected_error", message: errorMessage(e) };
      state = "failed";
    }

    const result: AgentResult = {
      runId,
      agent: this.kind,
      question,
      finalText: state === "concluded" ? run.finalText : "",
      trace: run.recorder.finalize(),
      iterationCount: run.iteration,
      toolCallCount: run.toolCalls,
      status: state === "concluded" ? "concluded" : "failed",
      failure: state === "concluded" ? undefined : run.failure,
      durationMs: Date.now() - start,
    };

    this.logger.info(
      { runId, status: result.status, iterations: result.iterationCount, failure: result.failure?.reason },
      "ReAct run finished"
    );
    this.eventBus?.emit("AgentFinishEvent", {
      runId,
      agent: this.kind,
      status: result.status,
      iterationCount: result.iterationCount,
      durationMs: result.durationMs,
      failure: result.failure,
    });
    return result;
  }

  private async think(run: Run): Promise<LoopState> {
    if (run.iteration >= this.maxIterations) {
      run.failure = { reason: "iteration_limit", message: new IterationLimitExceeded(this.maxIterations).message };
      return "failed";
    }
    run.iteration++;

    const prompt = reactPrompt(run.question, run.recorder.render(), run.correction, this.maxPromptTokens);
    run.correction = undefined;
    const step = await callModel(
      this.model,
      { system: reactSystemPrompt(this.tools.describeForPrompt()), prompt },
      this.stepTimeoutMs
    );

    if (!step.ok) {
      if (!isTimeout(step.error)) {
        run.failure = { reason: "model_error", message: step.error.message };
        return "failed";
      }
      run.recorder.error("timeout", step.error.message);
      return this.recoverable(run, "timeout", step.error.message, TIMEOUT_CORRECTION);
    }

    const reply = parseModelReply(step.text, { parameterOrder: (name) => this.tools.parameterOrder(name) });
    if (reply.thought) run.recorder.thought(reply.thought);

    switch (reply.kind) {
      case "invalid":
        run.recorder.error("parse", reply.reason, step.text);
        return this.recoverable(run, "parse_failure", reply.reason, parseCorrection(reply.reason));
      case "final":
        run.consecutiveFailures = 0;
        run.recorder.finalAnswer(reply.answer);
        run.finalText = reply.answer;
        return "concluded";
      case "action":
        run.consecutiveFailures = 0;
        run.recorder.action(reply.call);
        run.pending = reply.call;
        return "acting";
    }
  }

  private recoverable(
    run: Run,
    reason: "timeout" | "parse_failure",
    message: string,
    correction: string
  ): LoopState {
    run.consecutiveFailures++;
    if (run.consecutiveFailures >= MAX_CONSECUTIVE_FAILURES) {
      run.failure = { reason, message };
      return "failed";
    }
    this.logger.debug({ runId: run.runId, reason, message }, "Recoverable step failure, re-prompting");
    run.correction = correction;
    return "thinking";
  }

  private async act(run: Run): Promise<LoopState> {
    const call = run.pending;
    if (!call) return "thinking";
    run.pending = undefined;

    if (!run.dataset) {
      try {
        run.dataset = await this.data.getDataset(this.tableId);
      } catch (e) {
        const failure = dataFailure(e);
        if (!failure) throw e;
        this.logger.warn({ runId: run.runId, tableId: this.tableId, err: e }, "Dataset unavailable");
        run.failure = failure;
        return "failed";
      }
    }

    run.observation = this.tools.invoke(call, run.dataset);
    run.toolCalls++;
    return "observing";
  }

  private observe(run: Run): LoopState {
    if (run.observation) {
      run.recorder.observation(run.observation);
      run.observation = undefined;
    }
    return "thinking";
  }

  private onStep(run: Run, step: ReasoningStep): void {
    this.eventBus?.emit("AgentStepEvent", { runId: run.runId, agent: this.kind, iteration: run.iteration, step });
  }
}
