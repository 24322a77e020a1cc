#!/usr/bin/env node
/**
 * src/cli/index.ts
 * CLI entry (commander)
 */

import "dotenv/config";
import { Command } from "commander";
import { askCommand } from "./commands/ask";
import { compareCommand } from "./commands/compare";
import { dataFetchCommand } from "./commands/dataFetch";
import { evaluateCommand } from "./commands/evaluate";
import { toolsListCommand } from "./commands/toolsList";
import { loadConfig } from "./utils/loadConfig";
import { reportError } from "./utils/reportError";
import { createRuntime, Runtime, RuntimeFactory } from "./utils/runtime";

/**
 * Built on first use, so commands that fail on configuration report it as a
 * command error.
 */
function lazyRuntime(): RuntimeFactory {
  let runtime: Runtime | undefined;
  return () => {
    runtime ??= createRuntime(loadConfig());
    return runtime;
  };
}

export function createCli(runtime: RuntimeFactory = lazyRuntime()): Command {
  const program = new Command();

  program
    .name("household-agents")
    .description("Compare a ReAct agent and a single-step baseline on Norwegian household spending questions")
    .version("0.1.0");

  program.addCommand(askCommand(runtime));
  program.addCommand(compareCommand(runtime));
  program.addCommand(evaluateCommand(runtime));
  program.addCommand(dataFetchCommand(runtime));
  program.addCommand(toolsListCommand(runtime));

  return program;
}

if (require.main === module) {
  createCli().parseAsync(process.argv).catch(reportError);
}
