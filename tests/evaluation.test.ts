/**
 * Evaluation runner and summaries
 */

import fs from "fs";
import os from "os";
import path from "path";
import { BaselineAgent } from "../src/core/agent/baselineAgent";
import { ReactAgent } from "../src/core/agent/reactAgent";
import { ConfigError } from "../src/core/errors";
import { loadQuestions, runEvaluation, summarize } from "../src/core/evaluation/runner";
import { ScriptedAdapter } from "../src/core/models/mockAdapter";
import type { AgentResult } from "../src/core/types";
import { fixtureDataset, spendingRegistry, StaticProvider, TABLE_ID } from "./helpers/fixtures";

function result(overrides: Partial<AgentResult>): AgentResult {
  return {
    runId: "r",
    agent: "react",
    question: "q",
    finalText: "",
    trace: [],
    iterationCount: 1,
    toolCallCount: 0,
    status: "concluded",
    durationMs: 10,
    ...overrides,
  };
}

describe("runEvaluation", () => {
  test("should run every question through every agent in order", async () => {
    const deps = { tools: spendingRegistry(), data: new StaticProvider(fixtureDataset()), tableId: TABLE_ID };
    const react = new ReactAgent({
      ...deps,
      model: new ScriptedAdapter(() => "Final Answer: from react"),
    });
    const baseline = new BaselineAgent({
      ...deps,
      model: new ScriptedAdapter(() => "Final Answer: from baseline"),
    });
    const seen: string[] = [];

    const report = await runEvaluation(["q1", "q2"], [baseline, react], {
      onResult: (r, i) => seen.push(`${i}:${r.agent}:${r.question}`),
    });

    expect(seen).toEqual(["0:baseline:q1", "1:react:q1", "2:baseline:q2", "3:react:q2"]);
    expect(report.results.map((r) => r.finalText)).toEqual([
      "from baseline",
      "from react",
      "from baseline",
      "from react",
    ]);
    expect(report.summaries.map((s) => [s.agent, s.runs, s.concluded, s.grounded])).toEqual([
      ["baseline", 2, 2, 0],
      ["react", 2, 2, 0],
    ]);
  });
});

describe("summarize", () => {
  test("should aggregate the runs of one agent", () => {
    const grounded = result({
      iterationCount: 3,
      toolCallCount: 2,
      durationMs: 30,
      trace: [{ type: "observation", observation: { toolName: "list_categories", ok: true, summary: "s" } }],
    });
    const failed = result({ status: "failed", iterationCount: 1, durationMs: 10 });
    const other = result({ agent: "baseline" });

    expect(summarize("react", [grounded, failed, other])).toEqual({
      agent: "react",
      runs: 2,
      concluded: 1,
      failed: 1,
      meanIterations: 2,
      toolCalls: 2,
      grounded: 1,
      meanDurationMs: 20,
    });
  });

  test("should report zeros for an agent without runs", () => {
    expect(summarize("baseline", [])).toMatchObject({ runs: 0, meanIterations: 0, meanDurationMs: 0 });
  });
});

describe("loadQuestions", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "household-agents-questions-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const write = (body: string): string => {
    const file = path.join(dir, "questions.json");
    fs.writeFileSync(file, body, "utf8");
    return file;
  };

  test("should accept a plain array or a questions object", async () => {
    expect(await loadQuestions(write('["a", "b"]'))).toEqual(["a", "b"]);
    expect(await loadQuestions(write('{"questions": ["c"]}'))).toEqual(["c"]);
  });

  test("should reject other shapes with ConfigError", async () => {
    await expect(loadQuestions(write('{"items": []}'))).rejects.toThrow(ConfigError);
    await expect(loadQuestions(write("not json"))).rejects.toThrow("is not valid JSON");
  });
});
