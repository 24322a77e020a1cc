/**
 * src/cli/commands/dataFetch.ts
 * household-agents data:fetch [--refresh]
 */

import { Command } from "commander";
import { aliasesFor } from "../../core/tools/categories";
import { printTable } from "../utils/printTable";
import { reportError } from "../utils/reportError";
import type { RuntimeFactory } from "../utils/runtime";

export function dataFetchCommand(runtime: RuntimeFactory): Command {
  const cmd = new Command("data:fetch");
  cmd
    .description("Load the statistics table into the cache and list its categories")
    .option("--refresh", "fetch from the API even when the cache is fresh")
    .action(async (opts: { refresh?: boolean }) => {
      try {
        const rt = runtime();
        const tableId = rt.config.data.tableId;
        const dataset = opts.refresh ? await rt.dataStore.refresh(tableId) : await rt.dataStore.getDataset(tableId);

        console.log(
          `Table ${dataset.tableId}: ${dataset.label} (${dataset.records.length} records, periods ${dataset.periods.join(", ")})`
        );
        printTable(
          ["CODE", "CATEGORY", "ALIASES"],
          dataset.categories.map((c) => [c.code, c.label, aliasesFor(c.code).join(", ")])
        );
      } catch (e) {
        reportError(e);
      }
    });
  return cmd;
}
