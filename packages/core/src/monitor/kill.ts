/**
 * Kill a tracked session: terminate the agent tree, then the root shell tree,
 * and record the session as KILLED.
 */

import { SIGTERM_EXIT_CODE, type Session } from "../types/index.js";
import type { SessionRegistry } from "../registry/index.js";
import type { KillReport, ProcessTree } from "../process/index.js";

export type KillSessionResult =
  | { ok: true; session: Session; reports: KillReport[] }
  | { ok: false; error: "not found" | "not active" };

export async function killSession(
  registry: SessionRegistry,
  tree: ProcessTree,
  id: string
): Promise<KillSessionResult> {
  const target = registry.get(id);
  if (!target) {
    return { ok: false, error: "not found" };
  }
  if (!registry.beginKill(id)) {
    return { ok: false, error: "not active" };
  }

  // Monitor ticks in between see the processes die; the registry holds their
  // DONE back until KILLED is recorded below.
  const reports: KillReport[] = [];
  try {
    if (target.agentPid !== null) {
      reports.push(await tree.killTree(target.agentPid));
    }
    if (target.shellPid !== null) {
      reports.push(await tree.killTree(target.shellPid));
    }
  } finally {
    registry.finish(id, "KILLED", SIGTERM_EXIT_CODE);
  }

  const session = registry.get(id);
  if (!session) {
    return { ok: false, error: "not found" };
  }
  return { ok: true, session, reports };
}
