/**
 * In-memory session registry.
 *
 * The single source of truth for session records. Three producers write to
 * it (registration API, activity monitor, startup discovery) and the board
 * reads from it.
 *
 * Every method is synchronous and performs no I/O, so each call runs to
 * completion on the event loop without interleaving: that is the registry's
 * mutual exclusion. Producers await their process or file queries first and
 * then apply the result with a single call.
 */

import {
  isActiveStatus,
  isTerminalStatus,
  type ActiveStatus,
  type RegisterSessionInput,
  type RegistryStats,
  type Session,
  type SessionStatus,
  type TerminalStatus,
} from "../types/index.js";
import { deriveGroup } from "./group.js";

export type UpdateResult =
  | { ok: true; session: Session }
  | { ok: false; error: "not found" };

/** Hysteresis state the activity classifier reads and rewrites */
export interface ActivityState {
  status: ActiveStatus;
  highStreak: number;
  lowStreak: number;
}

export type ActivityClassifier = (
  state: ActivityState,
  cpuPercent: number
) => ActivityState;

export interface SessionRegistryOptions {
  /** Clock in epoch milliseconds */
  now?: () => number;
}

export class SessionRegistry {
  private readonly sessions = new Map<string, Session>();
  /** Sessions whose process trees are being terminated */
  private readonly killing = new Set<string>();
  private readonly now: () => number;
  private totalCreated = 0;

  constructor(options: SessionRegistryOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  private timestamp(): string {
    return new Date(this.now()).toISOString();
  }

  /**
   * Create a session in IDLE. An existing record with the same id is
   * replaced.
   */
  register(input: RegisterSessionInput): Session {
    const at = this.timestamp();
    const workingDirectory = input.workingDirectory ?? null;
    const session: Session = {
      id: input.id,
      name: input.name,
      status: "IDLE",
      shellPid: input.shellPid ?? null,
      agentPid: null,
      workingDirectory,
      group: deriveGroup(workingDirectory),
      createdAt: at,
      workStartedAt: null,
      finishedAt: null,
      exitCode: null,
      cpuHighStreak: 0,
      cpuLowStreak: 0,
      lastCpuPercent: null,
      statusChangedAt: at,
    };
    this.sessions.set(session.id, session);
    this.killing.delete(session.id);
    this.totalCreated += 1;
    return { ...session };
  }

  /**
   * Apply an explicit status report.
   * Reports against a finished session, and terminal reports against a
   * session being killed, are accepted and ignored.
   */
  updateStatus(
    id: string,
    status: SessionStatus,
    exitCode?: number | null
  ): UpdateResult {
    const session = this.sessions.get(id);
    if (!session) {
      return { ok: false, error: "not found" };
    }
    const held = isTerminalStatus(status) && this.killing.has(id);
    if (!isTerminalStatus(session.status) && !held) {
      session.exitCode = exitCode ?? null;
      this.transition(session, status);
    }
    return { ok: true, session: { ...session } };
  }

  /** Point-in-time copies of every record, in registration order */
  snapshot(): Session[] {
    return Array.from(this.sessions.values(), (session) => ({ ...session }));
  }

  get(id: string): Session | null {
    const session = this.sessions.get(id);
    return session ? { ...session } : null;
  }

  stats(): RegistryStats {
    return { totalCreated: this.totalCreated, tracked: this.sessions.size };
  }

  /** Whether any record (finished or not) is rooted at this shell */
  isShellTracked(shellPid: number): boolean {
    for (const session of this.sessions.values()) {
      if (session.shellPid === shellPid) return true;
    }
    return false;
  }

  /**
   * Adopt the agent process for a session. The first adoption sticks.
   * Returns false when the session is unknown or already has an agent.
   */
  setAgentPid(id: string, agentPid: number): boolean {
    const session = this.sessions.get(id);
    if (!session || session.agentPid !== null) {
      return false;
    }
    session.agentPid = agentPid;
    return true;
  }

  /**
   * Feed one CPU sample through the classifier and store the outcome.
   * Ignored for unknown or finished sessions.
   */
  recordCpuSample(
    id: string,
    cpuPercent: number,
    classify: ActivityClassifier
  ): Session | null {
    const session = this.sessions.get(id);
    if (!session || !isActiveStatus(session.status)) {
      return null;
    }

    const next = classify(
      {
        status: session.status,
        highStreak: session.cpuHighStreak,
        lowStreak: session.cpuLowStreak,
      },
      cpuPercent
    );

    session.cpuHighStreak = next.highStreak;
    session.cpuLowStreak = next.lowStreak;
    session.lastCpuPercent = cpuPercent;
    this.transition(session, next.status);
    return { ...session };
  }

  /**
   * Mark an active session as being killed. Until `finish(id, "KILLED")`
   * lands, any other terminal status for it is ignored, so processes exiting
   * under the kill's own signals do not record DONE or FAILED.
   * Returns false when the session is unknown or already finished.
   */
  beginKill(id: string): boolean {
    const session = this.sessions.get(id);
    if (!session || !isActiveStatus(session.status)) {
      return false;
    }
    this.killing.add(id);
    return true;
  }

  isBeingKilled(id: string): boolean {
    return this.killing.has(id);
  }

  /**
   * Move an active session to a terminal status.
   * Returns null when the session is unknown, already finished, or being
   * killed and `status` is not KILLED.
   */
  finish(id: string, status: TerminalStatus, exitCode: number | null): Session | null {
    const session = this.sessions.get(id);
    if (!session || !isActiveStatus(session.status)) {
      return null;
    }
    if (status !== "KILLED" && this.killing.has(id)) {
      return null;
    }
    this.killing.delete(id);
    session.exitCode = exitCode;
    this.transition(session, status);
    return { ...session };
  }

  /**
   * Remove sessions that finished more than retentionMs ago and return them.
   * A retention of 0 keeps everything.
   */
  prune(retentionMs: number): Session[] {
    if (retentionMs <= 0) {
      return [];
    }

    const cutoff = this.now() - retentionMs;
    const removed: Session[] = [];
    for (const [id, session] of this.sessions) {
      if (
        isTerminalStatus(session.status) &&
        session.finishedAt !== null &&
        Date.parse(session.finishedAt) < cutoff
      ) {
        this.sessions.delete(id);
        removed.push({ ...session });
      }
    }
    return removed;
  }

  private transition(session: Session, next: SessionStatus): void {
    const previous = session.status;
    if (next === previous) {
      return;
    }

    const at = this.timestamp();
    if (next === "RUNNING") {
      session.workStartedAt = at;
    }
    if (isTerminalStatus(next)) {
      session.finishedAt = at;
    }
    session.status = next;
    session.statusChangedAt = at;
  }
}
