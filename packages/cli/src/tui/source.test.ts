import { describe, it, expect, vi } from "vitest";
import {
  SessionRegistry,
  type KillReport,
  type NamePredicate,
  type ProcessResult,
  type ProcessTree,
  type ProcessEntry,
  loadConfig,
} from "@session-board/core";
import type { EngineHandle, EngineOptions } from "@session-board/service";
import { DaemonClient, type HealthResponse } from "../client.js";
import { HttpBoardSource, LocalBoardSource } from "./source.js";

class NoopTree implements ProcessTree {
  isAlive(): boolean {
    return true;
  }
  async listProcesses(): Promise<ProcessResult<ProcessEntry[]>> {
    return { ok: true, value: [] };
  }
  async directChildren(_pid: number, _predicate: NamePredicate): Promise<ProcessResult<number[]>> {
    return { ok: true, value: [] };
  }
  async aggregateCpu(): Promise<ProcessResult<number>> {
    return { ok: true, value: 0 };
  }
  async killTree(pid: number): Promise<KillReport> {
    return { attempted: [pid], failed: [], skipped: [] };
  }
}

describe("HttpBoardSource", () => {
  it("combines the session list with the creation counter", async () => {
    const client = new DaemonClient("http://127.0.0.1:8080");
    const health: HealthResponse = {
      status: "ok",
      pid: 100,
      uptime: 5,
      startedAt: "2026-03-01T10:00:00.000Z",
      totalSessions: 7,
      trackedSessions: 0,
      archivedSessions: 3,
    };
    vi.spyOn(client, "listSessions").mockResolvedValue([]);
    vi.spyOn(client, "health").mockResolvedValue(health);

    const source = new HttpBoardSource(client);

    expect(source.label).toBe("127.0.0.1:8080");
    await expect(source.load()).resolves.toEqual({ sessions: [], totalCreated: 7 });
  });
});

describe("LocalBoardSource", () => {
  it("reads the in-process registry and kills through it", async () => {
    const registry = new SessionRegistry();
    registry.register({ id: "s-1", name: "api", shellPid: 4242 });
    const shutdown = vi.fn().mockResolvedValue(undefined);
    let received: EngineOptions | undefined;

    const source = await LocalBoardSource.start(async (options) => {
      received = options;
      const engine: EngineHandle = {
        registry,
        tree: new NoopTree(),
        recentDirs: { list: () => [], promote: () => [] },
        db: null,
        app: null,
        config: loadConfig(),
        shutdown,
      };
      return engine;
    });

    expect(received?.listen).toBe(false);
    expect(received?.handleSignals).toBe(false);

    const before = await source.load();
    expect(before.totalCreated).toBe(1);
    expect(before.sessions.map((s) => s.status)).toEqual(["IDLE"]);

    await expect(source.kill("s-1")).resolves.toEqual({ ok: true });
    expect(registry.get("s-1")?.status).toBe("KILLED");
    await expect(source.kill("s-1")).resolves.toEqual({ ok: false, error: "not active" });

    await source.close();
    expect(shutdown).toHaveBeenCalledOnce();
  });
});
