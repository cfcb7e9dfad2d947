#!/usr/bin/env node
/**
 * session-board-report
 *
 * Called from a shell wrapper around the agent command; see
 * bin/session-board.sh. Always exits 0 unless the arguments are wrong.
 */

import {
  ReportClient,
  USAGE,
  UsageError,
  currentBranch,
  loadReporterConfig,
  parseArgs,
  runReport,
} from "./report.js";
import type { ReportCommand } from "./types.js";

function parseOrExit(argv: string[]): ReportCommand {
  try {
    return parseArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(error.message);
      console.error(USAGE);
      process.exit(2);
    }
    throw error;
  }
}

async function main(): Promise<void> {
  const command = parseOrExit(process.argv.slice(2));
  const config = loadReporterConfig();
  await runReport(command, {
    client: new ReportClient(config),
    cwd: process.cwd(),
    branch: (cwd) => currentBranch(cwd, config.timeoutMs),
    print: (line) => console.log(line),
  });
}

main().catch((error: unknown) => {
  if (process.env["SB_DEBUG"] === "1") {
    console.error(`[session-board-report] ${error instanceof Error ? error.message : String(error)}`);
  }
});
