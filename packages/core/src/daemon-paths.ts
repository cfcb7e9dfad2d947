/**
 * Daemon state files: PID, lock, log and port, all under ~/.session-board/.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { getBaseDir } from "./config.js";

export interface DaemonPaths {
  baseDir: string;
  pidFile: string;
  lockFile: string;
  logFile: string;
  portFile: string;
}

export function getDaemonPaths(): DaemonPaths {
  const baseDir = getBaseDir();
  return {
    baseDir,
    pidFile: path.join(baseDir, "session-board.pid"),
    lockFile: path.join(baseDir, "session-board.lock"),
    logFile: path.join(baseDir, "session-board.log"),
    portFile: path.join(baseDir, "session-board.port"),
  };
}

/** Read a positive integer no larger than max; null when missing or invalid */
function readNumberFile(filePath: string, max: number): number | null {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8").trim();
  } catch {
    return null;
  }
  if (!/^\d+$/.test(content)) {
    return null;
  }
  const value = parseInt(content, 10);
  return value > 0 && value <= max ? value : null;
}

function writeNumberFile(filePath: string, value: number): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, String(value), "utf-8");
}

/** Remove a state file; a missing file is fine */
export function removeStateFile(filePath: string): void {
  fs.rmSync(filePath, { force: true });
}

export function readPidFile(pidPath = getDaemonPaths().pidFile): number | null {
  return readNumberFile(pidPath, Number.MAX_SAFE_INTEGER);
}

export function writePidFile(pid: number, pidPath = getDaemonPaths().pidFile): void {
  writeNumberFile(pidPath, pid);
}

export function readPortFile(portPath = getDaemonPaths().portFile): number | null {
  return readNumberFile(portPath, 65535);
}

export function writePortFile(port: number, portPath = getDaemonPaths().portFile): void {
  writeNumberFile(portPath, port);
}

/**
 * Whether a process exists. EPERM means it exists under another user.
 */
export function isProcessRunning(pid: number): boolean {
  if (pid <= 0) {
    return false;
  }
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    const err = error as { code?: string };
    return err.code === "EPERM";
  }
}

export interface DaemonStatus {
  running: boolean;
  pid: number | null;
  port: number | null;
}

/** Inspect the PID file; a stale PID file is removed */
export function checkDaemonStatus(paths: DaemonPaths = getDaemonPaths()): DaemonStatus {
  const pid = readPidFile(paths.pidFile);
  if (pid === null) {
    return { running: false, pid: null, port: null };
  }
  if (!isProcessRunning(pid)) {
    removeStateFile(paths.pidFile);
    removeStateFile(paths.portFile);
    return { running: false, pid: null, port: null };
  }
  return { running: true, pid, port: readPortFile(paths.portFile) };
}
