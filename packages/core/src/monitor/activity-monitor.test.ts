/**
 * Tests for the activity monitor, driven through an in-memory process tree.
 */

import { describe, it, expect, beforeEach, vi, afterEach } from "vitest";
import { ActivityMonitor, agentNameMatcher } from "./activity-monitor.js";
import { SessionRegistry } from "../registry/index.js";
import { silentLogger } from "../logger.js";
import {
  fail,
  ok,
  type KillReport,
  type NamePredicate,
  type ProcessEntry,
  type ProcessResult,
  type ProcessTree,
} from "../process/index.js";

const T0 = Date.parse("2026-03-01T10:00:00.000Z");

class FakeTree implements ProcessTree {
  readonly alive = new Set<number>();
  readonly table: ProcessEntry[] = [];
  readonly cpuSamples: number[] = [];
  tableFails = false;
  cpuCalls: number[] = [];

  isAlive(pid: number): boolean {
    return this.alive.has(pid);
  }

  async listProcesses(): Promise<ProcessResult<ProcessEntry[]>> {
    return this.tableFails ? fail("ps failed") : ok([...this.table]);
  }

  async directChildren(
    pid: number,
    predicate: NamePredicate
  ): Promise<ProcessResult<number[]>> {
    if (this.tableFails) return fail("ps failed");
    return ok(
      this.table
        .filter((entry) => entry.ppid === pid && predicate(entry.name))
        .map((entry) => entry.pid)
    );
  }

  async aggregateCpu(pid: number): Promise<ProcessResult<number>> {
    this.cpuCalls.push(pid);
    const sample = this.cpuSamples.shift();
    return sample === undefined ? fail("no sample") : ok(sample);
  }

  async killTree(pid: number): Promise<KillReport> {
    this.alive.delete(pid);
    return { attempted: [pid], failed: [], skipped: [] };
  }
}

describe("agentNameMatcher", () => {
  it("matches case-insensitive substrings", () => {
    const matches = agentNameMatcher(["claude", "node"]);
    expect(matches("Claude")).toBe(true);
    expect(matches("node20")).toBe(true);
    expect(matches("zsh")).toBe(false);
  });
});

describe("ActivityMonitor", () => {
  let clock: number;
  let registry: SessionRegistry;
  let tree: FakeTree;
  let monitor: ActivityMonitor;

  beforeEach(() => {
    clock = T0;
    registry = new SessionRegistry({ now: () => clock });
    tree = new FakeTree();
    monitor = new ActivityMonitor({
      registry,
      tree,
      hysteresis: { threshold: 5, samples: 2 },
      agentNames: ["claude"],
      logger: silentLogger,
    });
  });

  it("adopts the agent child and samples it in the same tick", async () => {
    registry.register({ id: "s1", name: "s1", shellPid: 100 });
    tree.alive.add(100).add(101);
    tree.table.push(
      { pid: 101, ppid: 100, name: "claude" },
      { pid: 102, ppid: 100, name: "git" }
    );
    tree.cpuSamples.push(12);

    const results = await monitor.runOnce();

    expect(results.get("s1")).toBe("sampled");
    expect(registry.get("s1")?.agentPid).toBe(101);
    expect(registry.get("s1")?.lastCpuPercent).toBe(12);
    expect(tree.cpuCalls).toEqual([101]);
  });

  it("waits when no agent child exists yet", async () => {
    registry.register({ id: "s1", name: "s1", shellPid: 100 });
    tree.alive.add(100);
    tree.table.push({ pid: 102, ppid: 100, name: "git" });

    const results = await monitor.runOnce();

    expect(results.get("s1")).toBe("no-agent");
    expect(registry.get("s1")?.agentPid).toBeNull();
    expect(tree.cpuCalls).toEqual([]);
  });

  it("leaves state untouched when queries fail", async () => {
    registry.register({ id: "s1", name: "s1", shellPid: 100 });
    tree.alive.add(100);
    tree.tableFails = true;

    expect((await monitor.runOnce()).get("s1")).toBe("no-information");

    tree.tableFails = false;
    tree.table.push({ pid: 101, ppid: 100, name: "claude" });
    tree.alive.add(101);
    expect((await monitor.runOnce()).get("s1")).toBe("no-information");

    const session = registry.get("s1");
    expect(session?.status).toBe("IDLE");
    expect(session?.agentPid).toBe(101);
    expect(session?.lastCpuPercent).toBeNull();
  });

  it("marks the session DONE when the agent exits but the shell remains", async () => {
    registry.register({ id: "s1", name: "s1", shellPid: 100 });
    registry.setAgentPid("s1", 101);
    tree.alive.add(100);

    expect((await monitor.runOnce()).get("s1")).toBe("finished");
    expect(registry.get("s1")?.status).toBe("DONE");
    expect(registry.get("s1")?.exitCode).toBe(0);
  });

  it("skips sessions without a shell and finished sessions", async () => {
    registry.register({ id: "manual", name: "manual" });
    registry.register({ id: "over", name: "over", shellPid: 200 });
    registry.finish("over", "FAILED", 1);

    const results = await monitor.runOnce();

    expect(results.size).toBe(0);
    expect(registry.get("over")?.status).toBe("FAILED");
  });

  it("runs the full lifecycle of a session", async () => {
    registry.register({ id: "s1", name: "s1", shellPid: 100 });
    expect(registry.get("s1")?.status).toBe("IDLE");
    expect(registry.get("s1")?.group).toBe("General");

    tree.alive.add(100).add(101);
    tree.table.push({ pid: 101, ppid: 100, name: "claude" });
    tree.cpuSamples.push(30, 30, 1, 1);

    clock = T0 + 2000;
    await monitor.runOnce();
    expect(registry.get("s1")?.status).toBe("IDLE");

    clock = T0 + 4000;
    await monitor.runOnce();
    expect(registry.get("s1")?.status).toBe("RUNNING");
    expect(registry.get("s1")?.workStartedAt).toBe(new Date(T0 + 4000).toISOString());

    clock = T0 + 6000;
    await monitor.runOnce();
    clock = T0 + 8000;
    await monitor.runOnce();
    expect(registry.get("s1")?.status).toBe("IDLE");
    expect(registry.get("s1")?.workStartedAt).toBe(new Date(T0 + 4000).toISOString());

    tree.alive.delete(100);
    clock = T0 + 10_000;
    await monitor.runOnce();

    const done = registry.get("s1");
    expect(done?.status).toBe("DONE");
    expect(done?.exitCode).toBe(0);
    expect(done?.finishedAt).toBe(new Date(T0 + 10_000).toISOString());

    registry.updateStatus("s1", "FAILED");
    expect(registry.get("s1")?.status).toBe("DONE");
  });

  describe("loop", () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it("ticks on the poll interval until stopped", async () => {
      const looping = new ActivityMonitor({
        registry,
        tree,
        pollIntervalMs: 1000,
        agentNames: ["claude"],
        logger: silentLogger,
      });
      const runOnce = vi.spyOn(looping, "runOnce");

      looping.start();
      expect(looping.isRunning()).toBe(true);
      await vi.advanceTimersByTimeAsync(0);
      expect(runOnce).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(1000);
      expect(runOnce).toHaveBeenCalledTimes(2);

      await looping.stop();
      expect(looping.isRunning()).toBe(false);
      await vi.advanceTimersByTimeAsync(5000);
      expect(runOnce).toHaveBeenCalledTimes(2);
    });

    it("keeps ticking after a failed tick", async () => {
      const looping = new ActivityMonitor({
        registry,
        tree,
        pollIntervalMs: 1000,
        logger: silentLogger,
      });
      const runOnce = vi
        .spyOn(looping, "runOnce")
        .mockRejectedValueOnce(new Error("boom"));

      looping.start();
      await vi.advanceTimersByTimeAsync(0);
      await vi.advanceTimersByTimeAsync(1000);
      expect(runOnce).toHaveBeenCalledTimes(2);
      await looping.stop();
    });

    it("runs a single loop when restarted while a tick is running", async () => {
      const looping = new ActivityMonitor({
        registry,
        tree,
        pollIntervalMs: 1000,
        logger: silentLogger,
      });
      let release: () => void = () => {};
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      const runOnce = vi
        .spyOn(looping, "runOnce")
        .mockResolvedValue(new Map())
        .mockImplementationOnce(async () => {
          await gate;
          return new Map();
        });

      looping.start();
      await vi.advanceTimersByTimeAsync(0);
      expect(runOnce).toHaveBeenCalledTimes(1);

      const stopping = looping.stop();
      looping.start();
      await vi.advanceTimersByTimeAsync(0);
      // The new loop waits for the old tick.
      expect(runOnce).toHaveBeenCalledTimes(1);

      release();
      await stopping;
      await vi.advanceTimersByTimeAsync(0);
      expect(runOnce).toHaveBeenCalledTimes(2);

      await vi.advanceTimersByTimeAsync(1000);
      expect(runOnce).toHaveBeenCalledTimes(3);

      await looping.stop();
      await vi.advanceTimersByTimeAsync(5000);
      expect(runOnce).toHaveBeenCalledTimes(3);
    });
  });
});
