/**
 * src/cli/commands/compare.ts
 * household-agents compare <question>
 */

import { Command } from "commander";
import { printTable, truncate } from "../utils/printTable";
import { reportError } from "../utils/reportError";
import type { RuntimeFactory } from "../utils/runtime";
import { formatOutcome } from "./ask";

export function compareCommand(runtime: RuntimeFactory): Command {
  const cmd = new Command("compare");
  cmd
    .description("Run the baseline and the ReAct agent on the same question")
    .argument("<question>", "question about Norwegian household spending")
    .action(async (question: string) => {
      try {
        const rows: string[][] = [];
        for (const agent of runtime().agents()) {
          const result = await agent.answer(question);
          rows.push([
            result.agent,
            result.status,
            String(result.iterationCount),
            String(result.toolCallCount),
            truncate(formatOutcome(result), 80),
          ]);
        }
        printTable(["AGENT", "STATUS", "ITERATIONS", "TOOL CALLS", "ANSWER"], rows);
      } catch (e) {
        reportError(e);
      }
    });
  return cmd;
}
