/**
 * ProcessTree backed by the OS process table.
 * Uses ps-list for enumeration, pidusage for CPU sampling and
 * process.kill for liveness checks and termination.
 */

import psList from "ps-list";
import pidusage from "pidusage";
import { createLogger, errorMessage, type Logger } from "../logger.js";
import { withTimeout } from "./timeout.js";
import {
  ok,
  fail,
  type KillReport,
  type NamePredicate,
  type ProcessEntry,
  type ProcessResult,
  type ProcessTree,
} from "./types.js";

/** Low-level OS access, replaceable in tests */
export interface ProcessSystem {
  listProcesses(): Promise<ProcessEntry[]>;
  /** Instantaneous CPU percentage of a single process */
  sampleCpu(pid: number): Promise<number>;
  signal(pid: number, signal: NodeJS.Signals | 0): void;
}

export interface SystemProcessTreeOptions {
  system?: ProcessSystem;
  /** Deadline for each table query or CPU sample (default: 5000ms) */
  timeoutMs?: number;
  /** PIDs that are never signalled (default: this process) */
  protectedPids?: number[];
  logger?: Logger;
}

export const nodeProcessSystem: ProcessSystem = {
  async listProcesses() {
    const processes = await psList();
    return processes.map((p) => ({
      pid: p.pid,
      ppid: p.ppid,
      name: p.name,
      cmd: p.cmd,
    }));
  },
  async sampleCpu(pid) {
    const stats = await pidusage(pid);
    return stats.cpu;
  },
  signal(pid, signal) {
    process.kill(pid, signal);
  },
};

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

export class SystemProcessTree implements ProcessTree {
  private readonly system: ProcessSystem;
  private readonly timeoutMs: number;
  private readonly protectedPids: Set<number>;
  private readonly logger: Logger;

  constructor(options: SystemProcessTreeOptions = {}) {
    this.system = options.system ?? nodeProcessSystem;
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.protectedPids = new Set(options.protectedPids ?? [process.pid]);
    this.logger = options.logger ?? createLogger("ProcessTree");
  }

  isAlive(pid: number): boolean {
    if (!Number.isInteger(pid) || pid <= 0) {
      return false;
    }
    try {
      // Signal 0 checks existence without delivering anything
      this.system.signal(pid, 0);
      return true;
    } catch (error) {
      // EPERM and friends mean the process exists but is not ours
      return errorCode(error) !== "ESRCH";
    }
  }

  async listProcesses(): Promise<ProcessResult<ProcessEntry[]>> {
    try {
      const processes = await withTimeout(
        this.system.listProcesses(),
        this.timeoutMs,
        "process table query"
      );
      return ok(processes);
    } catch (error) {
      this.logger.debug(`process table query failed: ${errorMessage(error)}`);
      return fail(errorMessage(error));
    }
  }

  async directChildren(
    pid: number,
    predicate: NamePredicate
  ): Promise<ProcessResult<number[]>> {
    const table = await this.listProcesses();
    if (!table.ok) {
      return table;
    }
    return ok(
      table.value
        .filter((entry) => entry.ppid === pid && predicate(entry.name))
        .map((entry) => entry.pid)
    );
  }

  async aggregateCpu(pid: number): Promise<ProcessResult<number>> {
    const table = await this.listProcesses();
    // Without a table we can still sample the process itself
    const children = table.ok
      ? table.value.filter((entry) => entry.ppid === pid).map((entry) => entry.pid)
      : [];

    const samples = await Promise.allSettled(
      [pid, ...children].map((target) =>
        withTimeout(this.system.sampleCpu(target), this.timeoutMs, `cpu sample ${target}`)
      )
    );

    const [root, ...rest] = samples;
    if (!root || root.status === "rejected") {
      const reason = root?.status === "rejected" ? errorMessage(root.reason) : "no sample";
      this.logger.debug(`cpu sample for ${pid} failed: ${reason}`);
      return fail(reason);
    }

    let total = root.value;
    for (const sample of rest) {
      // Children that exit mid-sample contribute nothing
      if (sample.status === "fulfilled") {
        total += sample.value;
      }
    }
    return ok(total);
  }

  async killTree(pid: number): Promise<KillReport> {
    const report: KillReport = { attempted: [], failed: [], skipped: [] };
    const childrenOf = new Map<number, number[]>();

    const table = await this.listProcesses();
    if (table.ok) {
      for (const entry of table.value) {
        const siblings = childrenOf.get(entry.ppid) ?? [];
        siblings.push(entry.pid);
        childrenOf.set(entry.ppid, siblings);
      }
    } else {
      this.logger.warn(
        `could not list children of ${pid}, terminating it alone: ${table.error}`
      );
    }

    const visited = new Set<number>();
    const terminate = (target: number): void => {
      if (visited.has(target)) return;
      visited.add(target);

      for (const child of childrenOf.get(target) ?? []) {
        terminate(child);
      }

      if (this.protectedPids.has(target)) {
        report.skipped.push(target);
        return;
      }

      report.attempted.push(target);
      try {
        this.system.signal(target, "SIGTERM");
      } catch (error) {
        report.failed.push(target);
        this.logger.debug(`SIGTERM to ${target} failed: ${errorMessage(error)}`);
      }
    };

    terminate(pid);
    return report;
  }
}
