/**
 * Working directory and branch lookups for a running process.
 */

import * as fs from "node:fs/promises";
import { runCommand } from "../process/index.js";

/** Parse `lsof -Fn` field output into pid → path */
export function parseLsofCwd(output: string): Map<number, string> {
  const result = new Map<number, string>();
  let currentPid: number | null = null;
  for (const line of output.split(/\r?\n/)) {
    if (line.startsWith("p")) {
      const pid = Number(line.slice(1));
      currentPid = Number.isInteger(pid) && pid > 0 ? pid : null;
    } else if (line.startsWith("n") && currentPid !== null) {
      const cwd = line.slice(1).trim();
      if (cwd) result.set(currentPid, cwd);
    }
  }
  return result;
}

export interface WorkspaceResolver {
  resolveCwd(pid: number): Promise<string | null>;
  resolveBranch(dir: string): Promise<string | null>;
}

export function createWorkspaceResolver(timeoutMs = 5000): WorkspaceResolver {
  return {
    async resolveCwd(pid) {
      if (process.platform === "linux") {
        try {
          return await fs.readlink(`/proc/${pid}/cwd`);
        } catch {
          // fall through to lsof
        }
      }
      const result = await runCommand(
        "lsof",
        ["-a", "-p", String(pid), "-d", "cwd", "-Fn"],
        { timeoutMs }
      );
      return result.ok ? (parseLsofCwd(result.value).get(pid) ?? null) : null;
    },

    async resolveBranch(dir) {
      const result = await runCommand("git", ["symbolic-ref", "--short", "HEAD"], {
        cwd: dir,
        timeoutMs,
      });
      if (!result.ok) return null;
      const branch = result.value.trim();
      return branch || null;
    },
  };
}
