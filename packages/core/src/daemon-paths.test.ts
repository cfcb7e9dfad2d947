import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import {
  checkDaemonStatus,
  getDaemonPaths,
  isProcessRunning,
  readPidFile,
  readPortFile,
  writePidFile,
  writePortFile,
  type DaemonPaths,
} from "./daemon-paths.js";

// Far above any pid_max, so never a live process
const DEAD_PID = 999999999;

describe("getDaemonPaths", () => {
  it("keeps every state file in ~/.session-board", () => {
    const paths = getDaemonPaths();
    const base = path.join(os.homedir(), ".session-board");

    expect(paths).toEqual({
      baseDir: base,
      pidFile: path.join(base, "session-board.pid"),
      lockFile: path.join(base, "session-board.lock"),
      logFile: path.join(base, "session-board.log"),
      portFile: path.join(base, "session-board.port"),
    });
  });
});

describe("state files", () => {
  let tempDir: string;
  let paths: DaemonPaths;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "sb-state-test-"));
    paths = {
      baseDir: tempDir,
      pidFile: path.join(tempDir, "run", "daemon.pid"),
      lockFile: path.join(tempDir, "daemon.lock"),
      logFile: path.join(tempDir, "daemon.log"),
      portFile: path.join(tempDir, "run", "daemon.port"),
    };
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("writes and reads a PID, creating the directory", () => {
    writePidFile(4321, paths.pidFile);
    expect(readPidFile(paths.pidFile)).toBe(4321);
  });

  it("rejects malformed PID files", () => {
    expect(readPidFile(paths.pidFile)).toBeNull();
    fs.mkdirSync(path.dirname(paths.pidFile), { recursive: true });
    for (const content of ["", "abc", "-5", "0", "12x"]) {
      fs.writeFileSync(paths.pidFile, content);
      expect(readPidFile(paths.pidFile)).toBeNull();
    }
    fs.writeFileSync(paths.pidFile, " 77 \n");
    expect(readPidFile(paths.pidFile)).toBe(77);
  });

  it("only accepts ports in range", () => {
    writePortFile(8080, paths.portFile);
    expect(readPortFile(paths.portFile)).toBe(8080);
    fs.writeFileSync(paths.portFile, "70000");
    expect(readPortFile(paths.portFile)).toBeNull();
  });

  it("reports a running daemon with its port", () => {
    writePidFile(process.pid, paths.pidFile);
    writePortFile(8080, paths.portFile);
    expect(checkDaemonStatus(paths)).toEqual({ running: true, pid: process.pid, port: 8080 });
  });

  it("cleans up after a dead daemon", () => {
    writePidFile(DEAD_PID, paths.pidFile);
    writePortFile(8080, paths.portFile);

    expect(checkDaemonStatus(paths)).toEqual({ running: false, pid: null, port: null });
    expect(fs.existsSync(paths.pidFile)).toBe(false);
    expect(fs.existsSync(paths.portFile)).toBe(false);
  });
});

describe("isProcessRunning", () => {
  it("sees this process and not a dead one", () => {
    expect(isProcessRunning(process.pid)).toBe(true);
    expect(isProcessRunning(DEAD_PID)).toBe(false);
    expect(isProcessRunning(0)).toBe(false);
  });
});
