/**
 * Health check endpoint with daemon diagnostics.
 */

import type { FastifyInstance } from "fastify";
import type Database from "better-sqlite3";
import { countHistory, type SessionRegistry } from "@session-board/core";

interface HealthRoutesOptions {
  registry: SessionRegistry;
  /** History archive; archivedSessions is null without one */
  db: Database.Database | null;
  startedAt: string;
}

export async function registerHealthRoutes(
  app: FastifyInstance,
  options: HealthRoutesOptions
): Promise<void> {
  app.get("/api/health", async () => {
    const stats = options.registry.stats();

    return {
      status: "ok",
      pid: process.pid,
      uptime: process.uptime(),
      startedAt: options.startedAt,
      totalSessions: stats.totalCreated,
      trackedSessions: stats.tracked,
      archivedSessions: options.db ? countHistory(options.db) : null,
    };
  });
}
