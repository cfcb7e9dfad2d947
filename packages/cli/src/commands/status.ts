/**
 * Status command - daemon state and registry counters.
 */

import { checkDaemonStatus, getDaemonPaths, loadConfig } from "@session-board/core";
import { DaemonClient, type HealthResponse } from "../client.js";
import { formatUptime } from "../format.js";

export async function statusCommand(): Promise<void> {
  const config = loadConfig();
  const paths = getDaemonPaths();
  const status = checkDaemonStatus(paths);

  console.log("Session Board Status");
  console.log("====================");

  if (!status.running) {
    console.log("State:        stopped");
    console.log(`History DB:   ${config.dbPath}`);
    console.log("");
    console.log("Run 'session-board start --daemon' to start.");
    process.exit(1);
  }

  const port = status.port ?? config.listenPort;
  let health: HealthResponse | null = null;
  try {
    health = await new DaemonClient(`http://127.0.0.1:${port}`, 2000).health();
  } catch {
    health = null;
  }

  console.log("State:        running");
  console.log(`PID:          ${status.pid}`);
  if (health) {
    console.log(`Uptime:       ${formatUptime(health.uptime)}`);
  }
  console.log(`API:          http://127.0.0.1:${port} ${health ? "(✓)" : "(✗)"}`);
  if (health) {
    console.log(`Sessions:     ${health.trackedSessions} tracked, ${health.totalSessions} since start`);
  }
  if (health && health.archivedSessions === null) {
    console.log(`History DB:   ${config.dbPath} (unavailable)`);
  } else if (health) {
    console.log(`History DB:   ${config.dbPath} (${health.archivedSessions} archived)`);
  } else {
    console.log(`History DB:   ${config.dbPath}`);
  }
  console.log(`Log file:     ${paths.logFile}`);

  if (!health) {
    console.log("");
    console.log("⚠ API is not reachable. Check the log file.");
  }
}
