/**
 * Single-instance lock for the daemon.
 * The lock file is created exclusively and holds the owner's PID; a lock
 * whose owner is gone is reclaimed.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { isProcessRunning, removeStateFile } from "./daemon-paths.js";

export interface LockResult {
  acquired: boolean;
  existingPid?: number;
  error?: string;
}

function tryCreate(lockPath: string, pid: number): LockResult {
  try {
    fs.mkdirSync(path.dirname(lockPath), { recursive: true });
    fs.writeFileSync(lockPath, String(pid), { flag: "wx" });
    return { acquired: true };
  } catch (error) {
    const err = error as { code?: string; message?: string };
    if (err.code !== "EEXIST") {
      return { acquired: false, error: err.message ?? "Unknown error" };
    }
  }

  const existingPid = readLockOwner(lockPath);
  return existingPid === null
    ? { acquired: false, error: "Invalid PID in lock file" }
    : { acquired: false, existingPid };
}

function readLockOwner(lockPath: string): number | null {
  try {
    const pid = parseInt(fs.readFileSync(lockPath, "utf-8").trim(), 10);
    return Number.isInteger(pid) && pid > 0 ? pid : null;
  } catch {
    return null;
  }
}

/**
 * Acquire the lock, first reclaiming it (and the PID file) when the
 * recorded owner is no longer running or unreadable.
 */
export function acquireLock(
  lockPath: string,
  options: { pid?: number; pidPath?: string } = {}
): LockResult {
  const pid = options.pid ?? process.pid;

  if (fs.existsSync(lockPath)) {
    const owner = readLockOwner(lockPath);
    if (owner === null || !isProcessRunning(owner)) {
      removeStateFile(lockPath);
      if (options.pidPath) removeStateFile(options.pidPath);
    }
  }

  return tryCreate(lockPath, pid);
}

export function releaseLock(lockPath: string): void {
  removeStateFile(lockPath);
}
