/**
 * Stop command - stops a running daemon.
 */

import {
  checkDaemonStatus,
  getDaemonPaths,
  isProcessRunning,
  releaseLock,
  removeStateFile,
} from "@session-board/core";
import { sleep } from "./shared.js";

export interface StopCommandOptions {
  force?: boolean;
}

async function waitForExit(pid: number, timeoutMs: number): Promise<boolean> {
  const deadline = Date.now() + timeoutMs;
  while (Date.now() < deadline) {
    await sleep(100);
    if (!isProcessRunning(pid)) {
      return true;
    }
  }
  return false;
}

/**
 * Send SIGTERM and wait up to `timeoutMs` for the process to exit.
 */
export async function stopProcess(pid: number, timeoutMs = 5000): Promise<boolean> {
  try {
    process.kill(pid, "SIGTERM");
  } catch (error) {
    const err = error as { code?: string };
    if (err.code === "ESRCH") {
      return true;
    }
    throw error;
  }
  return waitForExit(pid, timeoutMs);
}

function cleanUp(): void {
  const paths = getDaemonPaths();
  removeStateFile(paths.pidFile);
  removeStateFile(paths.portFile);
  releaseLock(paths.lockFile);
}

export async function stopCommand(options: StopCommandOptions = {}): Promise<void> {
  const status = checkDaemonStatus();
  if (!status.running || status.pid === null) {
    console.log("Daemon is not running.");
    return;
  }
  const { pid } = status;

  console.log(`Stopping daemon (PID ${pid})...`);
  let stopped: boolean;
  try {
    stopped = await stopProcess(pid);
  } catch (error) {
    const err = error as { code?: string };
    if (err.code === "EPERM") {
      console.error("Permission denied. Cannot stop the daemon.");
      process.exit(1);
    }
    throw error;
  }

  if (stopped) {
    console.log("Daemon stopped.");
    cleanUp();
    return;
  }

  if (!options.force) {
    console.error("Daemon did not stop within 5 seconds.\nUse --force to send SIGKILL.");
    process.exit(1);
  }

  console.log("Process did not exit, sending SIGKILL...");
  try {
    process.kill(pid, "SIGKILL");
  } catch (error) {
    const err = error as { code?: string };
    if (err.code !== "ESRCH") {
      throw error;
    }
  }
  if (await waitForExit(pid, 1000)) {
    console.log("Daemon killed.");
    cleanUp();
  } else {
    console.error("Failed to kill daemon.");
    process.exit(1);
  }
}
