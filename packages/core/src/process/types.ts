/**
 * Process tree types.
 * Operations never throw: failures come back as result objects so a flaky
 * environment cannot take down the monitor loop.
 */

/** One row of the OS process table */
export interface ProcessEntry {
  pid: number;
  ppid: number;
  /** Command name (basename of the executable) */
  name: string;
  /** Full command line, when the platform reports it */
  cmd?: string;
}

export type ProcessResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };

/** Outcome of a best-effort tree termination */
export interface KillReport {
  /** PIDs a SIGTERM was sent to, in the order attempted */
  attempted: number[];
  /** PIDs whose signal failed (already gone, permission denied, ...) */
  failed: number[];
  /** PIDs deliberately left alone (this tool's own process) */
  skipped: number[];
}

export type NamePredicate = (name: string) => boolean;

/**
 * Stateless operations over OS process IDs.
 * Polling-based; an event-driven backend can implement the same interface.
 */
export interface ProcessTree {
  /** False only when the process does not exist */
  isAlive(pid: number): boolean;

  /** Full process table */
  listProcesses(): Promise<ProcessResult<ProcessEntry[]>>;

  /** Direct children of pid whose command name satisfies the predicate */
  directChildren(
    pid: number,
    predicate: NamePredicate
  ): Promise<ProcessResult<number[]>>;

  /** Summed CPU percentage of pid and its direct children */
  aggregateCpu(pid: number): Promise<ProcessResult<number>>;

  /** SIGTERM every descendant depth-first, then pid itself */
  killTree(pid: number): Promise<KillReport>;
}

export function ok<T>(value: T): ProcessResult<T> {
  return { ok: true, value };
}

export function fail<T>(error: string): ProcessResult<T> {
  return { ok: false, error };
}
