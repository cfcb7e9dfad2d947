/**
 * Run an external tool with a deadline and capture its stdout.
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { errorMessage } from "../logger.js";
import { ok, fail, type ProcessResult } from "./types.js";

const execFileAsync = promisify(execFile);

export interface RunCommandOptions {
  cwd?: string;
  timeoutMs?: number;
}

/**
 * Execute a command without a shell.
 * Non-zero exits, missing binaries and timeouts all come back as failures.
 */
export async function runCommand(
  command: string,
  args: string[],
  options: RunCommandOptions = {}
): Promise<ProcessResult<string>> {
  try {
    const { stdout } = await execFileAsync(command, args, {
      cwd: options.cwd,
      timeout: options.timeoutMs ?? 5000,
      encoding: "utf8",
    });
    return ok(stdout);
  } catch (error) {
    return fail(errorMessage(error));
  }
}
