/**
 * src/cli/commands/ask.ts
 * household-agents ask <question> [--agent react|baseline] [--json] [--trace]
 */

import { Command, Option } from "commander";
import { renderTrace } from "../../core/agent/traceRecorder";
import type { AgentKind, AgentResult } from "../../core/types";
import { reportError } from "../utils/reportError";
import type { RuntimeFactory } from "../utils/runtime";

export function isAgentKind(value: string): value is AgentKind {
  return value === "react" || value === "baseline";
}

export function formatOutcome(result: AgentResult): string {
  if (result.status === "concluded") return result.finalText;
  const failure = result.failure;
  return failure ? `Failed (${failure.reason}): ${failure.message}` : "Failed";
}

export function askCommand(runtime: RuntimeFactory): Command {
  const cmd = new Command("ask");
  cmd
    .description("Answer one question with one agent")
    .argument("<question>", "question about Norwegian household spending")
    .addOption(new Option("--agent <kind>", "agent to use").choices(["react", "baseline"]).default("react"))
    .option("--json", "print the full result as JSON")
    .option("--trace", "print the reasoning trace before the answer")
    .action(async (question: string, opts: { agent: string; json?: boolean; trace?: boolean }) => {
      try {
        const kind = isAgentKind(opts.agent) ? opts.agent : "react";
        const result = await runtime().agent(kind).answer(question);

        if (opts.json) {
          console.log(JSON.stringify(result, null, 2));
        } else {
          if (opts.trace) {
            console.log(renderTrace(result.trace, { includeErrors: true }));
            console.log("");
          }
          console.log(formatOutcome(result));
        }
        if (result.status === "failed") process.exitCode = 1;
      } catch (e) {
        reportError(e);
      }
    });
  return cmd;
}
