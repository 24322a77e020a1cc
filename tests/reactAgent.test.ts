/**
 * ReAct agent loop against a scripted model
 */

import { ReactAgent, ReactAgentOptions } from "../src/core/agent/reactAgent";
import { parseCorrection } from "../src/core/agent/prompts";
import { EventBus } from "../src/core/eventBus";
import { FetchError, ModelError } from "../src/core/errors";
import { ScriptedAdapter, ScriptedReply, ScriptFn } from "../src/core/models/mockAdapter";
import type { Observation, Trace } from "../src/core/types";
import { FailingProvider, fixtureDataset, spendingRegistry, StaticProvider, TABLE_ID } from "./helpers/fixtures";

const QUESTION = "How much more do households spend on housing than on food?";

function makeAgent(
  replies: ScriptedReply[] | ScriptFn,
  overrides: Partial<ReactAgentOptions> = {}
): { agent: ReactAgent; model: ScriptedAdapter } {
  const model = new ScriptedAdapter(replies);
  const agent = new ReactAgent({
    model,
    tools: spendingRegistry(),
    data: new StaticProvider(fixtureDataset()),
    tableId: TABLE_ID,
    ...overrides,
  });
  return { agent, model };
}

function observations(trace: Trace): Observation[] {
  const found: Observation[] = [];
  for (const step of trace) {
    if (step.type === "observation") found.push(step.observation);
  }
  return found;
}

describe("ReactAgent", () => {
  test("should gather two figures and conclude", async () => {
    const data = new StaticProvider(fixtureDataset());
    const { agent, model } = makeAgent(
      [
        'Thought: I need housing spending.\nAction: get_average_spending("housing")',
        'Thought: Now food.\nAction: get_average_spending("food")',
        "Thought: I can answer now.\nFinal Answer: Housing (15,234 NOK per month) costs about 2.33 times food (6,543 NOK per month).",
      ],
      { data }
    );

    const result = await agent.answer(QUESTION);

    expect(result.status).toBe("concluded");
    expect(result.failure).toBeUndefined();
    expect(result.finalText).toContain("2.33");
    expect(result.iterationCount).toBe(3);
    expect(result.toolCallCount).toBe(2);
    expect(result.trace.map((s) => s.type)).toEqual([
      "thought",
      "action",
      "observation",
      "thought",
      "action",
      "observation",
      "thought",
      "final_answer",
    ]);
    expect(data.calls).toBe(1);
    expect(model.calls[1].prompt).toBe(
      [
        `Question: ${QUESTION}`,
        "Thought: I need housing spending.",
        'Action: get_average_spending({"category":"housing"})',
        "Observation: Norwegian households spend an average of 15,234 NOK per month on Housing (182,808 NOK per year). " +
          "Source: Statistics Norway table 10235, period 2012.",
      ].join("\n")
    );
    expect(model.calls[0].temperature).toBe(0);
  });

  test("should feed a lookup error back and let the model recover", async () => {
    const { agent } = makeAgent([
      'Action: get_average_spending("transportation_xyz")',
      'Action: get_average_spending("transport")',
      "Final Answer: About 7,600 NOK per month.",
    ]);

    const result = await agent.answer("What do households spend on transport?");

    expect(result.status).toBe("concluded");
    const [failed, ok] = observations(result.trace);
    expect(failed.error?.type).toBe("ToolLookupError");
    expect(ok.ok).toBe(true);
    expect(ok.summary).toContain("7,600 NOK per month on Transport");
  });

  test("should stop at the iteration cap", async () => {
    const { agent, model } = makeAgent(() => "Action: list_categories()", { maxIterations: 3 });

    const result = await agent.answer(QUESTION);

    expect(result).toMatchObject({
      status: "failed",
      finalText: "",
      iterationCount: 3,
      toolCallCount: 3,
      failure: { reason: "iteration_limit", message: "No final answer within 3 iterations" },
    });
    expect(model.callCount).toBe(3);
  });

  test("should re-prompt once after an unusable reply", async () => {
    const { agent, model } = makeAgent(["I am not sure.", "Final Answer: 6,543 NOK per month."]);

    const result = await agent.answer(QUESTION);

    expect(result.status).toBe("concluded");
    expect(result.finalText).toBe("6,543 NOK per month.");
    expect(result.trace[0]).toEqual({
      type: "error",
      kind: "parse",
      message: "Reply contains neither an Action nor a Final Answer",
      raw: "I am not sure.",
    });
    expect(model.calls[1].prompt).toBe(
      `Question: ${QUESTION}\n${parseCorrection("Reply contains neither an Action nor a Final Answer")}`
    );
  });

  test("should fail with parse_failure after two unusable replies in a row", async () => {
    const { agent } = makeAgent(["I am not sure.", "Still thinking about it."]);

    const result = await agent.answer(QUESTION);

    expect(result).toMatchObject({
      status: "failed",
      iterationCount: 2,
      failure: { reason: "parse_failure", message: "Reply contains neither an Action nor a Final Answer" },
    });
  });

  test("should treat a slow step as recoverable once", async () => {
    const { agent } = makeAgent([{ content: "Final Answer: late", delayMs: 1000 }, "Final Answer: on time"], {
      stepTimeoutMs: 20,
    });

    const result = await agent.answer(QUESTION);

    expect(result.status).toBe("concluded");
    expect(result.finalText).toBe("on time");
    expect(result.trace[0]).toMatchObject({ type: "error", kind: "timeout" });
  });

  test("should fail with timeout after two slow steps", async () => {
    const slow = { content: "Final Answer: late", delayMs: 1000 };
    const { agent } = makeAgent([slow, slow], { stepTimeoutMs: 20 });

    const result = await agent.answer(QUESTION);

    expect(result.status).toBe("failed");
    expect(result.failure?.reason).toBe("timeout");
    expect(result.trace.map((s) => s.type)).toEqual(["error", "error"]);
  });

  test("should fail with data_unavailable without further model calls", async () => {
    const data = new FailingProvider(new FetchError("SSB API answered 503 Service Unavailable for table 10235"));
    const { agent, model } = makeAgent(['Action: get_average_spending("food")', "Final Answer: unused"], { data });

    const result = await agent.answer(QUESTION);

    expect(result).toMatchObject({
      status: "failed",
      iterationCount: 1,
      toolCallCount: 0,
      failure: { reason: "data_unavailable", message: "SSB API answered 503 Service Unavailable for table 10235" },
    });
    expect(model.callCount).toBe(1);
    expect(result.trace.map((s) => s.type)).toEqual(["action"]);
  });

  test("should fail with model_error when the model call errors", async () => {
    const { agent } = makeAgent([{ error: new ModelError("bad gateway", "scripted") }]);

    const result = await agent.answer(QUESTION);

    expect(result.failure).toEqual({ reason: "model_error", message: "bad gateway" });
    expect(result.trace).toEqual([]);
  });

  test("should report unexpected errors as a failed run instead of throwing", async () => {
    const { agent } = makeAgent(['Action: get_average_spending("food")'], {
      data: new FailingProvider(new Error("disk on fire")),
    });

    const result = await agent.answer(QUESTION);

    expect(result.failure).toEqual({ reason: "unexpected_error", message: "disk on fire" });
  });

  test("should emit start, step and finish events", async () => {
    const bus = new EventBus();
    const { agent } = makeAgent(['Action: get_average_spending("food")', "Final Answer: 6,543 NOK"], { eventBus: bus });

    const result = await agent.answer(QUESTION);

    const types = bus.history.map((e) => e.type);
    expect(types[0]).toBe("AgentStartEvent");
    expect(types[types.length - 1]).toBe("AgentFinishEvent");
    expect(bus.getHistory({ type: "AgentStepEvent" })).toHaveLength(result.trace.length);
  });

  test("should never exceed maxIterations model calls", async () => {
    for (const maxIterations of [1, 2, 4]) {
      const { agent, model } = makeAgent(() => 'Action: get_total_spending()', { maxIterations });
      const result = await agent.answer(QUESTION);
      expect(result.iterationCount).toBeLessThanOrEqual(maxIterations);
      expect(model.callCount).toBe(maxIterations);
    }
  });
});
