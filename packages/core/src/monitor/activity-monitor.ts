/**
 * Activity monitor loop.
 *
 * Every poll interval, for each IDLE or RUNNING session with a root shell:
 * detect death of the shell or its agent, adopt the agent child if none is
 * known yet, sample CPU and feed the hysteresis classifier.
 * Process queries run outside the registry; results are written back with
 * one registry call each.
 */

import { isActiveStatus } from "../types/index.js";
import type { SessionRegistry, ActivityClassifier } from "../registry/index.js";
import type { NamePredicate, ProcessTree } from "../process/index.js";
import { createLogger, errorMessage, type Logger } from "../logger.js";
import { createHysteresisClassifier, type HysteresisOptions } from "./classifier.js";

export interface ActivityMonitorOptions {
  registry: SessionRegistry;
  tree: ProcessTree;
  /** Period between ticks (default: 2000ms) */
  pollIntervalMs?: number;
  hysteresis?: HysteresisOptions;
  /** Substrings identifying the agent runtime among a shell's children */
  agentNames?: string[];
  logger?: Logger;
}

/** What a tick did for one session */
export type SessionCheck =
  | "finished"
  | "sampled"
  | "no-agent"
  | "no-information";

interface MonitorTarget {
  id: string;
  shellPid: number;
  agentPid: number | null;
}

export function agentNameMatcher(agentNames: string[]): NamePredicate {
  const needles = agentNames.map((name) => name.toLowerCase());
  return (name) => {
    const lower = name.toLowerCase();
    return needles.some((needle) => lower.includes(needle));
  };
}

export class ActivityMonitor {
  private readonly registry: SessionRegistry;
  private readonly tree: ProcessTree;
  private readonly pollIntervalMs: number;
  private readonly classify: ActivityClassifier;
  private readonly isAgentName: NamePredicate;
  private readonly logger: Logger;

  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private stopped = true;
  /** Bumped by every start() so an older loop stops rescheduling itself */
  private generation = 0;

  constructor(options: ActivityMonitorOptions) {
    this.registry = options.registry;
    this.tree = options.tree;
    this.pollIntervalMs = options.pollIntervalMs ?? 2000;
    this.classify = createHysteresisClassifier(options.hysteresis);
    this.isAgentName = agentNameMatcher(options.agentNames ?? ["claude", "node"]);
    this.logger = options.logger ?? createLogger("Monitor");
  }

  isRunning(): boolean {
    return !this.stopped;
  }

  /**
   * Start ticking. The first tick runs immediately, or as soon as a tick
   * left over from before a stop() has finished.
   */
  start(): void {
    if (!this.stopped) {
      return;
    }
    this.stopped = false;
    this.generation += 1;
    this.schedule(this.generation, 0);
  }

  /** Stop scheduling ticks and wait for the current one to finish */
  async stop(): Promise<void> {
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  private schedule(generation: number, delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      const previous = this.inFlight ?? Promise.resolve();
      const current: Promise<void> = previous
        .then(() => this.tick())
        .finally(() => {
          if (this.inFlight === current) {
            this.inFlight = null;
          }
          if (!this.stopped && generation === this.generation) {
            this.schedule(generation, this.pollIntervalMs);
          }
        });
      this.inFlight = current;
    }, delayMs);
  }

  private async tick(): Promise<void> {
    try {
      await this.runOnce();
    } catch (error) {
      this.logger.warn(`tick failed: ${errorMessage(error)}`);
    }
  }

  /**
   * Check every active session once.
   * Returns what happened per session id.
   */
  async runOnce(): Promise<Map<string, SessionCheck>> {
    const targets: MonitorTarget[] = [];
    for (const session of this.registry.snapshot()) {
      if (isActiveStatus(session.status) && session.shellPid !== null) {
        targets.push({
          id: session.id,
          shellPid: session.shellPid,
          agentPid: session.agentPid,
        });
      }
    }

    const results = new Map<string, SessionCheck>();
    for (const target of targets) {
      try {
        results.set(target.id, await this.checkSession(target));
      } catch (error) {
        this.logger.warn(`check of ${target.id} failed: ${errorMessage(error)}`);
        results.set(target.id, "no-information");
      }
    }
    return results;
  }

  private async checkSession(target: MonitorTarget): Promise<SessionCheck> {
    const { id, shellPid } = target;

    if (!this.tree.isAlive(shellPid)) {
      this.markDone(id, `shell ${shellPid} exited`);
      return "finished";
    }

    let agentPid = target.agentPid;
    if (agentPid !== null && !this.tree.isAlive(agentPid)) {
      // The shell may linger after the agent itself exits
      this.markDone(id, `agent ${agentPid} exited`);
      return "finished";
    }

    if (agentPid === null) {
      const children = await this.tree.directChildren(shellPid, this.isAgentName);
      if (!children.ok) {
        return "no-information";
      }
      const [first] = children.value;
      if (first === undefined) {
        return "no-agent";
      }
      if (this.registry.setAgentPid(id, first)) {
        this.logger.debug(`session ${id} adopted agent ${first}`);
      }
      agentPid = this.registry.get(id)?.agentPid ?? first;
    }

    const cpu = await this.tree.aggregateCpu(agentPid);
    if (!cpu.ok) {
      return "no-information";
    }

    const before = this.registry.get(id)?.status;
    const after = this.registry.recordCpuSample(id, cpu.value, this.classify);
    if (after && before !== after.status) {
      this.logger.debug(
        `session ${id} ${before ?? "?"} -> ${after.status} (cpu ${cpu.value.toFixed(1)}%)`
      );
    }
    return "sampled";
  }

  private markDone(id: string, reason: string): void {
    const session = this.registry.finish(id, "DONE", 0);
    if (session) {
      this.logger.debug(`session ${id} done: ${reason}`);
    }
  }
}
