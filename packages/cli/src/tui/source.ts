/**
 * Where the board gets its sessions: the running daemon over HTTP, or an
 * engine started inside the board process.
 */

import { killSession, silentLogger, type Session } from "@session-board/core";
import type { EngineHandle, EngineOptions } from "@session-board/service";
import type { DaemonClient } from "../client.js";

export interface BoardSnapshot {
  sessions: Session[];
  totalCreated: number;
}

export type KillOutcome = { ok: true } | { ok: false; error: string };

export interface BoardSource {
  /** Shown in the footer */
  readonly label: string;
  load(): Promise<BoardSnapshot>;
  kill(id: string): Promise<KillOutcome>;
  close(): Promise<void>;
}

export class HttpBoardSource implements BoardSource {
  readonly label: string;

  constructor(private readonly client: DaemonClient) {
    this.label = client.baseUrl.replace(/^https?:\/\//, "");
  }

  async load(): Promise<BoardSnapshot> {
    const [sessions, health] = await Promise.all([
      this.client.listSessions(),
      this.client.health(),
    ]);
    return { sessions, totalCreated: health.totalSessions };
  }

  async kill(id: string): Promise<KillOutcome> {
    const result = await this.client.killSession(id);
    return result.ok ? { ok: true } : { ok: false, error: result.error };
  }

  async close(): Promise<void> {}
}

export class LocalBoardSource implements BoardSource {
  readonly label = "in-process";

  private constructor(private readonly engine: EngineHandle) {}

  /** Start an engine without the HTTP listener or console output */
  static async start(
    startEngine: (options: EngineOptions) => Promise<EngineHandle>
  ): Promise<LocalBoardSource> {
    const engine = await startEngine({
      listen: false,
      handleSignals: false,
      logger: silentLogger,
    });
    return new LocalBoardSource(engine);
  }

  async load(): Promise<BoardSnapshot> {
    return {
      sessions: this.engine.registry.snapshot(),
      totalCreated: this.engine.registry.stats().totalCreated,
    };
  }

  async kill(id: string): Promise<KillOutcome> {
    const result = await killSession(this.engine.registry, this.engine.tree, id);
    return result.ok ? { ok: true } : { ok: false, error: result.error };
  }

  close(): Promise<void> {
    return this.engine.shutdown();
  }
}
