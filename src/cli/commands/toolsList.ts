/**
 * src/cli/commands/toolsList.ts
 * household-agents tools:list
 */

import { Command } from "commander";
import { formatParameters } from "../../core/tool-engine";
import { printTable } from "../utils/printTable";
import { reportError } from "../utils/reportError";
import type { RuntimeFactory } from "../utils/runtime";

export function toolsListCommand(runtime: RuntimeFactory): Command {
  const cmd = new Command("tools:list");
  cmd.description("List registered tools").action(() => {
    try {
      const rows = runtime()
        .tools.list()
        .map((def) => [def.name, formatParameters(def) || "-", def.description]);
      printTable(["NAME", "PARAMETERS", "DESCRIPTION"], rows);
    } catch (e) {
      reportError(e);
    }
  });
  return cmd;
}
