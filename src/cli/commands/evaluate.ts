/**
 * src/cli/commands/evaluate.ts
 * household-agents evaluate <file> [--out <file>]
 */

import { Command } from "commander";
import fs from "fs/promises";
import { loadQuestions, runEvaluation } from "../../core/evaluation/runner";
import { printTable } from "../utils/printTable";
import { reportError } from "../utils/reportError";
import type { RuntimeFactory } from "../utils/runtime";

export function evaluateCommand(runtime: RuntimeFactory): Command {
  const cmd = new Command("evaluate");
  cmd
    .description("Run both agents over a JSON list of questions and summarize")
    .argument("<file>", "JSON file with an array of questions")
    .option("--out <file>", "write every result as JSON")
    .action(async (file: string, opts: { out?: string }) => {
      try {
        const questions = await loadQuestions(file);
        const rt = runtime();
        const report = await runEvaluation(questions, rt.agents(), {
          onResult: (result, index) =>
            rt.logger.info({ index, agent: result.agent, status: result.status }, "Evaluation run finished"),
        });

        printTable(
          ["AGENT", "RUNS", "CONCLUDED", "FAILED", "MEAN ITERATIONS", "TOOL CALLS", "GROUNDED", "MEAN MS"],
          report.summaries.map((s) => [
            s.agent,
            String(s.runs),
            String(s.concluded),
            String(s.failed),
            s.meanIterations.toFixed(2),
            String(s.toolCalls),
            String(s.grounded),
            String(Math.round(s.meanDurationMs)),
          ])
        );

        if (opts.out) {
          await fs.writeFile(opts.out, JSON.stringify(report, null, 2), "utf8");
          console.log(`Results written to ${opts.out}`);
        }
      } catch (e) {
        reportError(e);
      }
    });
  return cmd;
}
