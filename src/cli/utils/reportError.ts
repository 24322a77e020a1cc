import { HouseholdAgentError, errorMessage } from "../../core/errors";

/**
 * Print a command failure and mark the process as failed without exiting,
 * so pending log writes still flush.
 */
export function reportError(e: unknown): void {
  const code = e instanceof HouseholdAgentError ? ` [${e.code}]` : "";
  console.error(`Error${code}: ${errorMessage(e)}`);
  process.exitCode = 1;
}
