/**
 * Retention pass: prune finished sessions from the registry and move them
 * into the history archive.
 */

import {
  archiveSessions,
  errorMessage,
  type Logger,
  type Session,
  type SessionRegistry,
} from "@session-board/core";
import type Database from "better-sqlite3";

/**
 * Returns the pruned sessions. They leave the registry even when the
 * archive is missing or the write fails.
 */
export function archivePruned(
  registry: SessionRegistry,
  db: Database.Database | null,
  retentionMs: number,
  logger: Logger
): Session[] {
  const pruned = registry.prune(retentionMs);
  if (pruned.length === 0 || !db) {
    return pruned;
  }
  try {
    archiveSessions(db, pruned);
  } catch (error) {
    logger.warn(`could not archive ${pruned.length} session(s): ${errorMessage(error)}`);
  }
  return pruned;
}
