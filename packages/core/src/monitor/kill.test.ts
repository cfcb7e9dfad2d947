import { describe, it, expect, beforeEach } from "vitest";
import { killSession } from "./kill.js";
import { ActivityMonitor } from "./activity-monitor.js";
import { SessionRegistry } from "../registry/index.js";
import { silentLogger } from "../logger.js";
import { ok, type KillReport, type ProcessTree } from "../process/index.js";

class RecordingTree implements ProcessTree {
  readonly killed: number[] = [];
  onKill: (pid: number) => void = () => {};

  isAlive(_pid: number): boolean {
    return true;
  }
  async listProcesses() {
    return ok([]);
  }
  async directChildren() {
    return ok<number[]>([]);
  }
  async aggregateCpu() {
    return ok(0);
  }
  async killTree(pid: number): Promise<KillReport> {
    this.killed.push(pid);
    this.onKill(pid);
    return { attempted: [pid], failed: [], skipped: [] };
  }
}

/** Processes die as they are signalled; the shell's kill waits for a release */
class SlowShellTree extends RecordingTree {
  private readonly alive: Set<number>;
  private readonly shellPid: number;
  private readonly gate: Promise<void>;
  releaseShell: () => void = () => {};

  constructor(shellPid: number, agentPid: number) {
    super();
    this.shellPid = shellPid;
    this.alive = new Set([shellPid, agentPid]);
    this.gate = new Promise((resolve) => {
      this.releaseShell = resolve;
    });
  }

  isAlive(pid: number): boolean {
    return this.alive.has(pid);
  }

  async killTree(pid: number): Promise<KillReport> {
    this.alive.delete(pid);
    if (pid === this.shellPid) {
      await this.gate;
    }
    return super.killTree(pid);
  }
}

describe("killSession", () => {
  let registry: SessionRegistry;
  let tree: RecordingTree;

  beforeEach(() => {
    registry = new SessionRegistry();
    tree = new RecordingTree();
  });

  it("kills the agent tree before the shell tree", async () => {
    registry.register({ id: "s1", name: "s1", shellPid: 100 });
    registry.setAgentPid("s1", 101);

    const result = await killSession(registry, tree, "s1");

    expect(tree.killed).toEqual([101, 100]);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.session.status).toBe("KILLED");
    expect(result.session.exitCode).toBe(-15);
    expect(result.reports).toHaveLength(2);
  });

  it("marks a session without processes as killed", async () => {
    registry.register({ id: "manual", name: "manual" });

    const result = await killSession(registry, tree, "manual");

    expect(tree.killed).toEqual([]);
    expect(result.ok && result.session.status).toBe("KILLED");
  });

  it("rejects unknown and finished sessions", async () => {
    registry.register({ id: "s1", name: "s1", shellPid: 100 });
    registry.finish("s1", "DONE", 0);

    expect(await killSession(registry, tree, "nope")).toEqual({
      ok: false,
      error: "not found",
    });
    expect(await killSession(registry, tree, "s1")).toEqual({
      ok: false,
      error: "not active",
    });
    expect(tree.killed).toEqual([]);
  });

  it("records KILLED even when a report of the exit arrives mid-kill", async () => {
    registry.register({ id: "s1", name: "s1", shellPid: 100 });
    tree.onKill = () => {
      registry.updateStatus("s1", "FAILED", 143);
      registry.finish("s1", "DONE", 0);
    };

    const result = await killSession(registry, tree, "s1");

    expect(result.ok && result.session.status).toBe("KILLED");
    expect(registry.get("s1")?.exitCode).toBe(-15);
    expect(registry.isBeingKilled("s1")).toBe(false);
  });

  it("records KILLED when a monitor tick sees the agent die between signals", async () => {
    registry.register({ id: "s1", name: "s1", shellPid: 100 });
    registry.setAgentPid("s1", 101);
    const slow = new SlowShellTree(100, 101);
    const monitor = new ActivityMonitor({ registry, tree: slow, logger: silentLogger });

    const killing = killSession(registry, slow, "s1");
    const checks = await monitor.runOnce();

    expect(checks.get("s1")).toBe("finished");
    expect(registry.get("s1")?.status).toBe("IDLE");

    slow.releaseShell();
    const result = await killing;

    expect(result.ok && result.session.status).toBe("KILLED");
    expect(registry.get("s1")?.exitCode).toBe(-15);
  });
});
