/**
 * Start command - runs the daemon in foreground or background.
 */

import { openSync, mkdirSync, constants } from "node:fs";
import { spawn } from "node:child_process";
import {
  checkDaemonStatus,
  getDaemonPaths,
  installTimestampLogging,
  isProcessRunning,
} from "@session-board/core";
import { DaemonAlreadyRunningError, startDaemon } from "@session-board/service";
import { loadEnvFile } from "../env-file.js";
import { sleep } from "./shared.js";
import { stopProcess } from "./stop.js";

export interface StartCommandOptions {
  envFile?: string;
  daemon?: boolean;
  force?: boolean;
}

/**
 * Re-run this CLI as `start` in a detached child with output going to the
 * log file, then wait for it to write its PID file.
 */
async function spawnBackground(options: StartCommandOptions): Promise<void> {
  const paths = getDaemonPaths();
  const entry = process.argv[1];
  if (entry === undefined) {
    console.error("Cannot locate the CLI entry point.");
    process.exit(1);
  }

  mkdirSync(paths.baseDir, { recursive: true });
  const logFd = openSync(
    paths.logFile,
    constants.O_WRONLY | constants.O_CREAT | constants.O_APPEND
  );

  const args = [...process.execArgv, entry, "start"];
  if (options.envFile) {
    args.push("--env-file", options.envFile);
  }

  console.log("Starting daemon in background...");
  const child = spawn(process.execPath, args, {
    detached: true,
    stdio: ["ignore", logFd, logFd],
    env: process.env,
  });
  child.unref();

  for (let attempt = 0; attempt < 10; attempt++) {
    await sleep(500);
    const status = checkDaemonStatus(paths);
    if (status.running && status.pid !== null) {
      console.log(`Daemon started (PID ${status.pid})`);
      console.log(`Log file: ${paths.logFile}`);
      console.log(`\nRun 'session-board status' to check status.`);
      return;
    }
    if (child.exitCode !== null) {
      break;
    }
  }

  console.error("Failed to start daemon. Check log file for details:");
  console.error(`  ${paths.logFile}`);
  process.exit(1);
}

export async function startCommand(options: StartCommandOptions = {}): Promise<void> {
  if (options.envFile) {
    try {
      loadEnvFile(options.envFile);
    } catch {
      console.error(`Env file not found: ${options.envFile}`);
      process.exit(1);
    }
  }

  const existing = checkDaemonStatus();
  if (existing.running && existing.pid !== null) {
    if (!options.force) {
      console.error(
        `Daemon is already running (PID ${existing.pid}).\n` +
          "Use --force to restart, or run: session-board stop"
      );
      process.exit(1);
    }
    console.log(`Stopping existing daemon (PID ${existing.pid})...`);
    if (!(await stopProcess(existing.pid)) && isProcessRunning(existing.pid)) {
      console.error("Failed to stop existing daemon. Try: session-board stop --force");
      process.exit(1);
    }
    console.log("Existing daemon stopped.");
  }

  if (options.daemon) {
    await spawnBackground(options);
    return;
  }

  installTimestampLogging();
  try {
    await startDaemon();
  } catch (error) {
    if (error instanceof DaemonAlreadyRunningError) {
      console.error(error.message);
    } else {
      console.error("Failed to start daemon:", error instanceof Error ? error.message : error);
    }
    process.exit(1);
  }
}
