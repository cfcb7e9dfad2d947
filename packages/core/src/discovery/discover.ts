/**
 * Startup discovery of agent sessions that were already running before the
 * daemon came up. Runs once, before the monitor and the API.
 */

import { randomUUID } from "node:crypto";
import * as path from "node:path";
import type { Session } from "../types/index.js";
import type { SessionRegistry } from "../registry/index.js";
import type { ProcessEntry, ProcessTree } from "../process/index.js";
import type { RecentDirectories } from "../recent-dirs.js";
import { createLogger, type Logger } from "../logger.js";
import { createWorkspaceResolver, type WorkspaceResolver } from "./workspace.js";

export interface DiscoveryOptions {
  registry: SessionRegistry;
  tree: ProcessTree;
  recentDirs?: Pick<RecentDirectories, "promote">;
  /** Exact command name of the agent runtime (default: "claude") */
  agentName?: string;
  /** PID of this tool, never adopted (default: process.pid) */
  ownPid?: number;
  resolver?: WorkspaceResolver;
  newId?: () => string;
  logger?: Logger;
}

/**
 * The desktop app ships a binary of the same name inside an .app bundle;
 * only the terminal runtime is a session.
 */
export function isAgentCandidate(
  entry: ProcessEntry,
  agentName: string,
  ownPid: number
): boolean {
  if (entry.name !== agentName) return false;
  if (entry.cmd?.includes(".app/")) return false;
  if (entry.ppid === 1) return false;
  return entry.pid !== ownPid && entry.ppid !== ownPid;
}

export function sessionName(dir: string | null, branch: string | null): string {
  const base = dir ? path.basename(path.normalize(dir)) || dir : "session";
  return branch ? `${base} (${branch})` : base;
}

/**
 * Register every pre-existing agent process as an IDLE session.
 * Returns the sessions created; a failing process table yields none.
 */
export async function discoverSessions(options: DiscoveryOptions): Promise<Session[]> {
  const logger = options.logger ?? createLogger("Discovery");
  const agentName = options.agentName ?? "claude";
  const ownPid = options.ownPid ?? process.pid;
  const resolver = options.resolver ?? createWorkspaceResolver();
  const newId = options.newId ?? randomUUID;

  const table = await options.tree.listProcesses();
  if (!table.ok) {
    logger.debug(`process table unavailable: ${table.error}`);
    return [];
  }

  const candidates = table.value.filter((entry) => isAgentCandidate(entry, agentName, ownPid));
  const created: Session[] = [];

  for (const candidate of candidates) {
    const cwd = await resolver.resolveCwd(candidate.pid);
    const branch = cwd ? await resolver.resolveBranch(cwd) : null;

    // A registration may have landed while we were resolving
    if (options.registry.isShellTracked(candidate.ppid)) {
      continue;
    }

    const session = options.registry.register({
      id: newId(),
      name: sessionName(cwd, branch),
      shellPid: candidate.ppid,
      workingDirectory: cwd,
    });
    options.registry.setAgentPid(session.id, candidate.pid);
    created.push(options.registry.get(session.id) ?? session);

    if (cwd) {
      options.recentDirs?.promote(cwd);
    }
  }

  if (created.length > 0) {
    logger.info(`discovered ${created.length} running session(s)`);
  }
  return created;
}
