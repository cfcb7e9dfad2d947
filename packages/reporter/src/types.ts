/**
 * Wire format of the registration API, as sent by the reporter.
 */

export type ReportedStatus = "RUNNING" | "DONE" | "FAILED";

/** Body of POST /task */
export interface RegisterTaskBody {
  id: string;
  name: string;
  shell_pid: number | null;
  cwd: string;
  hostname?: string;
}

/** Body of PATCH /task/:id */
export interface UpdateTaskBody {
  status: ReportedStatus;
  exit_code?: number;
}

/** A parsed reporter invocation */
export type ReportCommand =
  | { kind: "start"; shellPid: number | null; name: string | null }
  | { kind: "running"; id: string }
  | { kind: "exit"; id: string; exitCode: number }
  | { kind: "interrupted"; id: string }
  | { kind: "help" };

export interface ReporterConfig {
  /** Base URL of the daemon (default: http://127.0.0.1:$SB_LISTEN_PORT) */
  serverUrl: string;
  /** Per-request timeout in milliseconds */
  timeoutMs: number;
  debug: boolean;
}
