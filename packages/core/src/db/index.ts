/**
 * Database module exports.
 */

export { openDatabase, openMemoryDatabase } from "./connection.js";
export { runMigrations, getDefaultMigrationsDir } from "./migrations.js";
export {
  archiveSessions,
  listHistory,
  countHistory,
  type HistoryQueryOptions,
} from "./history.js";
