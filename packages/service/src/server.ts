/**
 * Fastify server factory.
 * Creates and configures the daemon server.
 */

import Fastify, { type FastifyInstance } from "fastify";
import type Database from "better-sqlite3";
import type {
  ProcessTree,
  RecentDirectories,
  SessionRegistry,
} from "@session-board/core";
import { registerHealthRoutes } from "./routes/health.js";
import { registerTasksRoutes } from "./routes/tasks.js";
import { registerHistoryRoutes } from "./routes/history.js";

export interface CreateServerOptions {
  registry: SessionRegistry;
  tree: ProcessTree;
  /** History archive; /api/history answers 503 without it */
  db?: Database.Database | null;
  recentDirs?: Pick<RecentDirectories, "list" | "promote"> | null;
  /** Fastify request logging (default: true) */
  logger?: boolean;
  startedAt?: string;
}

/**
 * Create a configured Fastify server instance.
 */
export async function createServer(
  options: CreateServerOptions
): Promise<FastifyInstance> {
  const { registry, tree, db, recentDirs } = options;

  const app = Fastify({
    logger: options.logger ?? true,
  });

  await registerHealthRoutes(app, {
    registry,
    db: db ?? null,
    startedAt: options.startedAt ?? new Date().toISOString(),
  });
  await registerTasksRoutes(app, { registry, tree, recentDirs });
  await registerHistoryRoutes(app, { db, recentDirs });

  return app;
}

/**
 * Start the server on localhost only.
 */
export async function startServer(
  app: FastifyInstance,
  port: number
): Promise<void> {
  await app.listen({
    port,
    host: "127.0.0.1",
  });
}
