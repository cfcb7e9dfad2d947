/**
 * Session types for Session Board.
 * A session represents one interactive agent run rooted at a shell process.
 */

/** Lifecycle status of a tracked session */
export type SessionStatus = "IDLE" | "RUNNING" | "DONE" | "FAILED" | "KILLED";

export const SESSION_STATUSES: readonly SessionStatus[] = [
  "IDLE",
  "RUNNING",
  "DONE",
  "FAILED",
  "KILLED",
];

/** Statuses from which no further transition is permitted */
export type TerminalStatus = Extract<SessionStatus, "DONE" | "FAILED" | "KILLED">;

/** Statuses the activity monitor keeps sampling */
export type ActiveStatus = Exclude<SessionStatus, TerminalStatus>;

/** Group used when a session has no usable working directory */
export const DEFAULT_GROUP = "General";

/** Exit code recorded for sessions terminated with SIGTERM */
export const SIGTERM_EXIT_CODE = -15;

export function isSessionStatus(value: unknown): value is SessionStatus {
  return SESSION_STATUSES.some((status) => status === value);
}

export function isTerminalStatus(status: SessionStatus): status is TerminalStatus {
  return status === "DONE" || status === "FAILED" || status === "KILLED";
}

export function isActiveStatus(status: SessionStatus): status is ActiveStatus {
  return status === "IDLE" || status === "RUNNING";
}

/**
 * A tracked session.
 * Timestamps are ISO 8601 strings.
 */
export interface Session {
  /** Opaque ID assigned by whoever registered the session */
  id: string;

  /** Display label */
  name: string;

  status: SessionStatus;

  /** PID of the root shell (null if unknown) */
  shellPid: number | null;

  /** PID of the discovered agent process under the shell */
  agentPid: number | null;

  workingDirectory: string | null;

  /** Display bucket derived from the working directory */
  group: string;

  createdAt: string;

  /** Most recent transition into RUNNING (null if never running) */
  workStartedAt: string | null;

  /** Transition into a terminal status (null while active) */
  finishedAt: string | null;

  exitCode: number | null;

  /** Consecutive CPU samples above the activity threshold */
  cpuHighStreak: number;

  /** Consecutive CPU samples at or below the activity threshold */
  cpuLowStreak: number;

  /** Last aggregate CPU percentage sampled (display only) */
  lastCpuPercent: number | null;

  /** Last time the status changed, used for flash highlighting */
  statusChangedAt: string;
}

/** Input accepted when registering a session */
export interface RegisterSessionInput {
  id: string;
  name: string;
  shellPid?: number | null;
  workingDirectory?: string | null;
}

/** Counters kept by the registry */
export interface RegistryStats {
  /** Sessions registered since startup (monotonic) */
  totalCreated: number;

  /** Records currently held */
  tracked: number;
}

/** A terminal session archived after leaving the registry */
export interface HistoryEntry {
  id: string;
  name: string;
  status: TerminalStatus;
  group: string;
  workingDirectory: string | null;
  exitCode: number | null;
  createdAt: string;
  workStartedAt: string | null;
  finishedAt: string;
  archivedAt: string;
}
