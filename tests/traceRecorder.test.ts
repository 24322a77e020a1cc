/**
 * Trace recording and rendering
 */

import { renderCall, renderTrace, TraceRecorder } from "../src/core/agent/traceRecorder";
import type { ReasoningStep } from "../src/core/types";

describe("TraceRecorder", () => {
  test("should record steps in order and render them as prompt text", () => {
    const recorder = new TraceRecorder();
    recorder.thought("I need housing");
    recorder.action({ toolName: "get_average_spending", arguments: { category: "housing" } });
    recorder.observation({ toolName: "get_average_spending", ok: true, summary: "15,234 NOK per month" });
    recorder.error("parse", "Final Answer is empty", "Final Answer:");
    recorder.finalAnswer("About 15,234 NOK");

    expect(recorder.length).toBe(5);
    expect(recorder.render()).toBe(
      [
        "Thought: I need housing",
        'Action: get_average_spending({"category":"housing"})',
        "Observation: 15,234 NOK per month",
        "Final Answer: About 15,234 NOK",
      ].join("\n")
    );
    expect(recorder.render({ includeErrors: true }).split("\n")[3]).toBe("Error: Final Answer is empty");
  });

  test("should keep the raw reply on parse errors only when given", () => {
    const recorder = new TraceRecorder();
    recorder.error("parse", "no label", "hello");
    recorder.error("timeout", "Model call exceeded 10ms");

    expect(recorder.snapshot()).toEqual([
      { type: "error", kind: "parse", message: "no label", raw: "hello" },
      { type: "error", kind: "timeout", message: "Model call exceeded 10ms" },
    ]);
  });

  test("should freeze steps and copy the action arguments", () => {
    const recorder = new TraceRecorder();
    const args: Record<string, unknown> = { category: "food" };
    recorder.action({ toolName: "get_average_spending", arguments: args });
    args.category = "housing";

    const [step] = recorder.snapshot();
    expect(Object.isFrozen(step)).toBe(true);
    expect(step).toEqual({ type: "action", call: { toolName: "get_average_spending", arguments: { category: "food" } } });
  });

  test("should refuse appends after finalize", () => {
    const recorder = new TraceRecorder();
    recorder.thought("done");
    const trace = recorder.finalize();

    expect(recorder.isFinalized).toBe(true);
    expect(Object.isFrozen(trace)).toBe(true);
    expect(() => recorder.finalAnswer("late")).toThrow("Trace is finalized; no further steps can be recorded");
    expect(trace).toHaveLength(1);
  });

  test("snapshots should not change when more steps are added", () => {
    const recorder = new TraceRecorder();
    recorder.thought("one");
    const before = recorder.snapshot();
    recorder.thought("two");

    expect(before).toHaveLength(1);
    expect(recorder.snapshot()).toHaveLength(2);
  });

  test("should report each appended step with its index", () => {
    const seen: Array<[string, number]> = [];
    const recorder = new TraceRecorder((step, index) => seen.push([step.type, index]));

    recorder.thought("a");
    recorder.finalAnswer("b");

    expect(seen).toEqual([
      ["thought", 0],
      ["final_answer", 1],
    ]);
  });

  test("should serialize as the list of steps", () => {
    const recorder = new TraceRecorder();
    recorder.thought("a");
    expect(JSON.parse(JSON.stringify(recorder))).toEqual([{ type: "thought", text: "a" }]);
  });
});

describe("renderCall / renderTrace", () => {
  test("should render calls without arguments as empty parentheses", () => {
    expect(renderCall({ toolName: "list_categories", arguments: {} })).toBe("list_categories()");
  });

  test("should render a plain trace array", () => {
    const trace: ReasoningStep[] = [
      { type: "thought", text: "t" },
      { type: "error", kind: "timeout", message: "slow" },
    ];
    expect(renderTrace(trace)).toBe("Thought: t");
    expect(renderTrace(trace, { includeErrors: true })).toBe("Thought: t\nError: slow");
  });
});
