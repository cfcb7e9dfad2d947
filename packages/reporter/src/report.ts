/**
 * Session reporting for shell wrappers: register a session, mark it running,
 * report how it exited. Reporting never fails the wrapped command.
 */

import { execFile } from "node:child_process";
import { randomUUID } from "node:crypto";
import { hostname } from "node:os";
import { basename } from "node:path";
import { promisify } from "node:util";
import type {
  RegisterTaskBody,
  ReportCommand,
  ReporterConfig,
  UpdateTaskBody,
} from "./types.js";

const execFileAsync = promisify(execFile);

export const USAGE = `Usage:
  session-board-report start [--shell-pid <pid>] [--name <name>]   prints the new session id
  session-board-report running <id>
  session-board-report exit <id> <exit-code>
  session-board-report interrupted <id>`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function parseInteger(value: string | undefined, what: string): number {
  if (value === undefined || !/^-?\d+$/.test(value)) {
    throw new UsageError(`${what} must be an integer`);
  }
  return parseInt(value, 10);
}

export function parseArgs(argv: string[]): ReportCommand {
  const [command, ...rest] = argv;
  switch (command) {
    case "start": {
      let shellPid: number | null = null;
      let name: string | null = null;
      for (let i = 0; i < rest.length; i++) {
        const flag = rest[i];
        const value = rest[i + 1];
        if (flag === "--shell-pid") {
          shellPid = parseInteger(value, "--shell-pid");
          i++;
        } else if (flag === "--name") {
          if (value === undefined) throw new UsageError("--name needs a value");
          name = value;
          i++;
        } else {
          throw new UsageError(`Unknown option: ${flag}`);
        }
      }
      return { kind: "start", shellPid, name };
    }
    case "running": {
      const [id] = rest;
      if (!id) throw new UsageError("running needs a session id");
      return { kind: "running", id };
    }
    case "exit": {
      const [id, code] = rest;
      if (!id) throw new UsageError("exit needs a session id");
      return { kind: "exit", id, exitCode: parseInteger(code, "exit code") };
    }
    case "interrupted": {
      const [id] = rest;
      if (!id) throw new UsageError("interrupted needs a session id");
      return { kind: "interrupted", id };
    }
    case undefined:
    case "help":
    case "--help":
    case "-h":
      return { kind: "help" };
    default:
      throw new UsageError(`Unknown command: ${command}`);
  }
}

export function loadReporterConfig(env: NodeJS.ProcessEnv = process.env): ReporterConfig {
  const port = env["SB_LISTEN_PORT"]?.trim() || "8080";
  return {
    serverUrl: (env["SB_SERVER_URL"]?.trim() || `http://127.0.0.1:${port}`).replace(/\/+$/, ""),
    timeoutMs: 2000,
    debug: env["SB_DEBUG"] === "1",
  };
}

/** "folder (branch)", or just the folder outside a git checkout */
export function sessionName(dir: string, branch: string | null): string {
  const folder = basename(dir) || dir;
  return branch ? `${folder} (${branch})` : folder;
}

export async function currentBranch(cwd: string, timeoutMs = 2000): Promise<string | null> {
  try {
    const { stdout } = await execFileAsync("git", ["symbolic-ref", "--short", "HEAD"], {
      cwd,
      timeout: timeoutMs,
    });
    return stdout.trim() || null;
  } catch {
    return null;
  }
}

/** Exit code reported when the user interrupts the agent with Ctrl-C */
export const INTERRUPT_EXIT_CODE = 130;

/** A zero exit is DONE, anything else FAILED */
export function exitReport(exitCode: number): UpdateTaskBody {
  return { status: exitCode === 0 ? "DONE" : "FAILED", exit_code: exitCode };
}

export class ReportClient {
  constructor(private readonly config: ReporterConfig) {}

  private async send(method: "POST" | "PATCH", path: string, body: unknown): Promise<boolean> {
    try {
      const response = await fetch(`${this.config.serverUrl}${path}`, {
        method,
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
      if (!response.ok) {
        this.debug(`${method} ${path} returned ${response.status}`);
      }
      return response.ok;
    } catch (error) {
      this.debug(`${method} ${path} failed: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  }

  private debug(message: string): void {
    if (this.config.debug) {
      console.error(`[session-board-report] ${message}`);
    }
  }

  register(body: RegisterTaskBody): Promise<boolean> {
    return this.send("POST", "/task", body);
  }

  update(id: string, body: UpdateTaskBody): Promise<boolean> {
    return this.send("PATCH", `/task/${encodeURIComponent(id)}`, body);
  }
}

export interface RunDependencies {
  client: ReportClient;
  cwd: string;
  branch: (cwd: string) => Promise<string | null>;
  newId?: () => string;
  host?: string;
  print: (line: string) => void;
}

/**
 * Run one invocation. `start` prints the session id even when the daemon is
 * unreachable so the wrapper can carry on.
 */
export async function runReport(command: ReportCommand, deps: RunDependencies): Promise<void> {
  switch (command.kind) {
    case "help":
      deps.print(USAGE);
      return;
    case "start": {
      const id = (deps.newId ?? randomUUID)();
      const name = command.name ?? sessionName(deps.cwd, await deps.branch(deps.cwd));
      await deps.client.register({
        id,
        name,
        shell_pid: command.shellPid,
        cwd: deps.cwd,
        hostname: deps.host ?? hostname(),
      });
      deps.print(id);
      return;
    }
    case "running":
      await deps.client.update(command.id, { status: "RUNNING" });
      return;
    case "exit":
      await deps.client.update(command.id, exitReport(command.exitCode));
      return;
    case "interrupted":
      // Ctrl-C counts as DONE
      await deps.client.update(command.id, { status: "DONE", exit_code: INTERRUPT_EXIT_CODE });
      return;
  }
}
