/**
 * History command - sessions archived after the retention period.
 */

import { isSessionStatus, isTerminalStatus, type TerminalStatus } from "@session-board/core";
import { formatHistoryTable } from "../format.js";
import { daemonClient, fail } from "./shared.js";

export interface HistoryCommandOptions {
  limit?: string;
  status?: string;
  group?: string;
  json?: boolean;
}

export async function historyCommand(options: HistoryCommandOptions = {}): Promise<void> {
  const limit = options.limit === undefined ? undefined : Number(options.limit);
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 1 || limit > 1000)) {
    console.error("--limit must be an integer between 1 and 1000");
    process.exit(1);
  }

  let status: TerminalStatus | undefined;
  if (options.status !== undefined) {
    const upper = options.status.toUpperCase();
    if (!isSessionStatus(upper) || !isTerminalStatus(upper)) {
      console.error(`Unknown status: ${options.status} (expected done, failed or killed)`);
      process.exit(1);
    }
    status = upper;
  }

  try {
    const entries = await daemonClient().history({ limit, status, group: options.group });
    console.log(options.json ? JSON.stringify(entries, null, 2) : formatHistoryTable(entries));
  } catch (error) {
    fail(error);
  }
}
