import type { Writable } from "node:stream";
import { getStateDir } from "../config/paths.js";
import { openVault, type OpenedVault } from "../gateway/lifecycle.js";
import { createLogger } from "../logging/logger.js";
import { TenureError } from "../errors.js";

/**
 * Opens the vault in the state dir for one command and closes it afterwards.
 * Domain errors become a one-line report and exit code 1; anything else
 * propagates to clipanion.
 */
export async function withVault(
  stdout: Writable,
  fn: (opened: OpenedVault) => void | Promise<void>,
): Promise<void> {
  const logger = createLogger({ level: "warn", json: true });
  const opened = openVault(getStateDir(), logger);
  try {
    await fn(opened);
  } catch (err) {
    if (!(err instanceof TenureError)) throw err;
    stdout.write(`Error (${err.code}): ${err.message}\n`);
    process.exitCode = 1;
  } finally {
    opened.db.close();
  }
}

export function formatTime(ms: number): string {
  return ms === 0 ? "-" : new Date(ms).toISOString();
}
