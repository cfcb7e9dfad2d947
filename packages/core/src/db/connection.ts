/**
 * SQLite database connection management.
 * Uses better-sqlite3 sync API.
 */

import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";

/**
 * Opens or creates a SQLite database at the given path.
 * Ensures the parent directory exists.
 */
export function openDatabase(dbPath: string): Database.Database {
  mkdirSync(dirname(dbPath), { recursive: true });
  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  return db;
}

/**
 * Creates an in-memory database for testing.
 */
export function openMemoryDatabase(): Database.Database {
  return new Database(":memory:");
}
