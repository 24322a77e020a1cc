import type { Observation, ReasoningStep, StepErrorKind, ToolCall, Trace } from "../types";

export interface RenderOptions {
  /** Include `error` steps as `Error:` lines (left out of prompts). */
  includeErrors?: boolean;
}

/**
 * Append-only record of the reasoning steps for one question.
 * `finalize()` freezes it; appending afterwards throws.
 */
export class TraceRecorder {
  private steps: ReasoningStep[] = [];
  private finalized = false;

  constructor(private onAppend?: (step: ReasoningStep, index: number) => void) {}

  get length(): number {
    return this.steps.length;
  }

  get isFinalized(): boolean {
    return this.finalized;
  }

  thought(text: string): void {
    this.append({ type: "thought", text });
  }

  action(call: ToolCall): void {
    this.append({
      type: "action",
      call: Object.freeze({ toolName: call.toolName, arguments: Object.freeze({ ...call.arguments }) }),
    });
  }

  observation(observation: Observation): void {
    this.append({ type: "observation", observation });
  }

  finalAnswer(text: string): void {
    this.append({ type: "final_answer", text });
  }

  error(kind: StepErrorKind, message: string, raw?: string): void {
    this.append(raw === undefined ? { type: "error", kind, message } : { type: "error", kind, message, raw });
  }

  append(step: ReasoningStep): void {
    if (this.finalized) {
      throw new Error("Trace is finalized; no further steps can be recorded");
    }
    const frozen = Object.freeze(step);
    this.steps.push(frozen);
    this.onAppend?.(frozen, this.steps.length - 1);
  }

  snapshot(): Trace {
    return Object.freeze([...this.steps]);
  }

  finalize(): Trace {
    this.finalized = true;
    return this.snapshot();
  }

  render(options: RenderOptions = {}): string {
    return renderTrace(this.steps, options);
  }

  toJSON(): Trace {
    return this.snapshot();
  }
}

export function renderStep(step: ReasoningStep): string {
  switch (step.type) {
    case "thought":
      return `Thought: ${step.text}`;
    case "action":
      return `Action: ${renderCall(step.call)}`;
    case "observation":
      return `Observation: ${step.observation.summary}`;
    case "final_answer":
      return `Final Answer: ${step.text}`;
    case "error":
      return `Error: ${step.message}`;
  }
}

export function renderCall(call: ToolCall): string {
  const hasArgs = Object.keys(call.arguments).length > 0;
  return `${call.toolName}(${hasArgs ? JSON.stringify(call.arguments) : ""})`;
}

export function renderTrace(trace: Trace, options: RenderOptions = {}): string {
  return trace
    .filter((s) => options.includeErrors || s.type !== "error")
    .map(renderStep)
    .join("\n");
}
