/**
 * Evaluation runner: every question through every agent, one run at a time.
 */

import * as fs from "fs/promises";
import { z } from "zod";
import { ConfigError } from "../errors";
import type { Agent, AgentKind, AgentResult } from "../types";

export interface AgentSummary {
  agent: AgentKind;
  runs: number;
  concluded: number;
  failed: number;
  meanIterations: number;
  toolCalls: number;
  /** Concluded runs backed by at least one successful observation. */
  grounded: number;
  meanDurationMs: number;
}

export interface EvaluationReport {
  results: AgentResult[];
  summaries: AgentSummary[];
}

export interface EvaluationHooks {
  onResult?: (result: AgentResult, index: number) => void;
}

export async function runEvaluation(
  questions: readonly string[],
  agents: readonly Agent[],
  hooks: EvaluationHooks = {}
): Promise<EvaluationReport> {
  const results: AgentResult[] = [];
  for (const question of questions) {
    for (const agent of agents) {
      const result = await agent.answer(question);
      results.push(result);
      hooks.onResult?.(result, results.length - 1);
    }
  }
  return { results, summaries: agents.map((a) => summarize(a.kind, results)) };
}

export function isGrounded(result: AgentResult): boolean {
  return (
    result.status === "concluded" &&
    result.trace.some((s) => s.type === "observation" && s.observation.ok)
  );
}

export function summarize(agent: AgentKind, results: readonly AgentResult[]): AgentSummary {
  const mine = results.filter((r) => r.agent === agent);
  const runs = mine.length;
  const mean = (pick: (r: AgentResult) => number): number =>
    runs === 0 ? 0 : mine.reduce((sum, r) => sum + pick(r), 0) / runs;

  return {
    agent,
    runs,
    concluded: mine.filter((r) => r.status === "concluded").length,
    failed: mine.filter((r) => r.status === "failed").length,
    meanIterations: mean((r) => r.iterationCount),
    toolCalls: mine.reduce((sum, r) => sum + r.toolCallCount, 0),
    grounded: mine.filter(isGrounded).length,
    meanDurationMs: mean((r) => r.durationMs),
  };
}

const QuestionFileSchema = z.union([
  z.array(z.string().min(1)),
  z.object({ questions: z.array(z.string().min(1)) }),
]);

/**
 * Questions file: a JSON array of strings, or `{ "questions": [...] }`.
 */
export async function loadQuestions(file: string): Promise<string[]> {
  const raw = await fs.readFile(file, "utf-8");
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    throw new ConfigError(`Questions file ${file} is not valid JSON`, "questions", e);
  }
  const parsed = QuestionFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`Questions file ${file} must hold an array of non-empty strings`, "questions");
  }
  return Array.isArray(parsed.data) ? parsed.data : parsed.data.questions;
}
