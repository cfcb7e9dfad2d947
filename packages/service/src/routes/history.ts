/**
 * Archived sessions and recent directories.
 */

import type { FastifyInstance } from "fastify";
import type Database from "better-sqlite3";
import {
  listHistory,
  type RecentDirectories,
  type TerminalStatus,
} from "@session-board/core";

interface HistoryRoutesOptions {
  db?: Database.Database | null;
  recentDirs?: Pick<RecentDirectories, "list"> | null;
}

interface HistoryQuery {
  limit?: number;
  status?: TerminalStatus;
  group?: string;
}

const historySchema = {
  querystring: {
    type: "object",
    properties: {
      limit: { type: "integer", minimum: 1, maximum: 1000, default: 50 },
      status: { type: "string", enum: ["DONE", "FAILED", "KILLED"] },
      group: { type: "string" },
    },
  },
} as const;

export async function registerHistoryRoutes(
  app: FastifyInstance,
  options: HistoryRoutesOptions
): Promise<void> {
  const { db, recentDirs } = options;

  app.get<{ Querystring: HistoryQuery }>(
    "/api/history",
    { schema: historySchema },
    async (request, reply) => {
      if (!db) {
        return reply.code(503).send({ error: "History archive is disabled" });
      }
      return listHistory(db, request.query);
    }
  );

  app.get("/api/recent", async () => recentDirs?.list() ?? []);
}
