/**
 * SQLite migrations runner.
 * Applies *.sql files from the migrations folder in name order, once each.
 */

import type Database from "better-sqlite3";
import { readdirSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { createLogger, type Logger } from "../logger.js";

/**
 * Runs all pending migrations and returns the filenames applied.
 * Creates the _migrations tracking table if it doesn't exist.
 */
export function runMigrations(
  db: Database.Database,
  migrationsDir: string,
  logger: Logger = createLogger("DB")
): string[] {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      filename TEXT PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const applied = new Set(
    db
      .prepare<[], { filename: string }>("SELECT filename FROM _migrations")
      .all()
      .map((row) => row.filename)
  );

  const files = readdirSync(migrationsDir)
    .filter((f) => f.endsWith(".sql"))
    .sort();

  const newlyApplied: string[] = [];
  for (const filename of files) {
    if (applied.has(filename)) {
      continue;
    }

    const sql = readFileSync(join(migrationsDir, filename), "utf-8");
    db.transaction(() => {
      db.exec(sql);
      db.prepare("INSERT INTO _migrations (filename) VALUES (?)").run(filename);
    })();

    logger.debug(`applied migration ${filename}`);
    newlyApplied.push(filename);
  }
  return newlyApplied;
}

/**
 * The package's migrations folder.
 * Both src/db/ and dist/db/ sit two levels below the package root.
 */
export function getDefaultMigrationsDir(): string {
  return fileURLToPath(new URL("../../migrations", import.meta.url));
}
