/**
 * Archive of finished sessions removed from the in-memory registry.
 */

import type Database from "better-sqlite3";
import {
  isSessionStatus,
  isTerminalStatus,
  type HistoryEntry,
  type Session,
  type TerminalStatus,
} from "../types/index.js";

interface HistoryRow {
  id: string;
  name: string;
  status: string;
  group_name: string;
  working_directory: string | null;
  exit_code: number | null;
  created_at: string;
  work_started_at: string | null;
  finished_at: string;
  archived_at: string;
}

export interface HistoryQueryOptions {
  /** Maximum rows, newest first (default: 50) */
  limit?: number;
  status?: TerminalStatus;
  group?: string;
}

function rowToEntry(row: HistoryRow): HistoryEntry[] {
  if (!isSessionStatus(row.status) || !isTerminalStatus(row.status)) {
    return [];
  }
  return [
    {
      id: row.id,
      name: row.name,
      status: row.status,
      group: row.group_name,
      workingDirectory: row.working_directory,
      exitCode: row.exit_code,
      createdAt: row.created_at,
      workStartedAt: row.work_started_at,
      finishedAt: row.finished_at,
      archivedAt: row.archived_at,
    },
  ];
}

/**
 * Store finished sessions. Sessions that are not terminal are skipped.
 * Rows are keyed on id and finish time: a re-registered id keeps its
 * earlier runs, and archiving the same run again writes nothing.
 * Returns the number of rows written.
 */
export function archiveSessions(
  db: Database.Database,
  sessions: Session[],
  archivedAt: string = new Date().toISOString()
): number {
  const insert = db.prepare(`
    INSERT OR IGNORE INTO session_history (
      id, name, status, group_name, working_directory, exit_code,
      created_at, work_started_at, finished_at, archived_at
    ) VALUES (
      @id, @name, @status, @group, @workingDirectory, @exitCode,
      @createdAt, @workStartedAt, @finishedAt, @archivedAt
    )
  `);

  const writeAll = db.transaction((batch: Session[]) => {
    let written = 0;
    for (const session of batch) {
      if (!isTerminalStatus(session.status) || session.finishedAt === null) {
        continue;
      }
      const { changes } = insert.run({
        id: session.id,
        name: session.name,
        status: session.status,
        group: session.group,
        workingDirectory: session.workingDirectory,
        exitCode: session.exitCode,
        createdAt: session.createdAt,
        workStartedAt: session.workStartedAt,
        finishedAt: session.finishedAt,
        archivedAt,
      });
      written += changes;
    }
    return written;
  });

  return writeAll(sessions);
}

/** Archived sessions, most recently finished first */
export function listHistory(
  db: Database.Database,
  options: HistoryQueryOptions = {}
): HistoryEntry[] {
  const conditions: string[] = [];
  const params: Record<string, string | number> = {
    limit: options.limit ?? 50,
  };

  if (options.status) {
    conditions.push("status = @status");
    params["status"] = options.status;
  }
  if (options.group) {
    conditions.push("group_name = @group");
    params["group"] = options.group;
  }

  const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
  const rows = db
    .prepare<Record<string, string | number>, HistoryRow>(
      `SELECT * FROM session_history ${where} ORDER BY finished_at DESC, id ASC LIMIT @limit`
    )
    .all(params);

  return rows.flatMap(rowToEntry);
}

export function countHistory(db: Database.Database): number {
  const row = db
    .prepare<[], { count: number }>("SELECT COUNT(*) AS count FROM session_history")
    .get();
  return row?.count ?? 0;
}
