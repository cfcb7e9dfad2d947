/**
 * @session-board/core
 *
 * Session registry, activity monitor, process tree, discovery and the
 * history archive behind Session Board.
 */

export * from "./types/index.js";
export * from "./registry/index.js";
export * from "./monitor/index.js";
export * from "./process/index.js";
export * from "./discovery/index.js";
export * from "./db/index.js";
export {
  loadConfig,
  getBaseDir,
  getDefaultDbPath,
  getDefaultRecentDirsPath,
  DEFAULT_AGENT_NAMES,
  type Config,
} from "./config.js";
export * from "./recent-dirs.js";
export * from "./daemon-paths.js";
export * from "./lockfile.js";
export * from "./logger.js";
