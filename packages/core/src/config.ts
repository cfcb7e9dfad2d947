/**
 * Configuration management.
 * Reads from environment variables with sensible defaults.
 */

import { homedir } from "node:os";
import { join } from "node:path";

/** Directory holding all Session Board state files */
export function getBaseDir(): string {
  return join(homedir(), ".session-board");
}

/** Get the default history database path in user's home directory */
export function getDefaultDbPath(): string {
  return join(getBaseDir(), "session-board.sqlite");
}

/** Get the default recent-directories file path */
export function getDefaultRecentDirsPath(): string {
  return join(getBaseDir(), "recent-dirs");
}

export interface Config {
  /** Port for the registration API (default: 8080) */
  listenPort: number;

  /** Period of the activity monitor loop (default: 2000ms) */
  pollIntervalMs: number;

  /** CPU percentage a sample must exceed to count as busy (default: 5) */
  cpuThreshold: number;

  /** Consecutive agreeing samples needed to flip IDLE/RUNNING (default: 2) */
  hysteresisSamples: number;

  /** How long the board keeps showing finished sessions (default: 30000ms) */
  visibilityWindowMs: number;

  /**
   * Age after which finished sessions are archived out of the registry;
   * 0 keeps them forever (default: 1h). Never shorter than the visibility window.
   */
  retentionMs: number;

  /** Upper bound on any single process-table query, signal or tool call (default: 5000ms) */
  externalTimeoutMs: number;

  /** Substrings identifying the agent runtime among a shell's children */
  agentNames: string[];

  /** Exact command name of agent processes adopted at startup */
  discoveryName: string;

  /** Path to the recent-directories file */
  recentDirsPath: string;

  /** Maximum number of recent directories kept */
  maxRecentDirs: number;

  /** Path to SQLite history database */
  dbPath: string;

  /** Use ASCII glyphs instead of box-drawing characters on the board */
  ascii: boolean;

  /** Enable debug logging */
  debug: boolean;
}

export const DEFAULT_AGENT_NAMES = ["claude", "node"];

function readNumber(
  name: string,
  fallback: number,
  accept: (value: number) => boolean = (value) => value >= 0
): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  return Number.isFinite(value) && accept(value) ? value : fallback;
}

function readList(name: string, fallback: string[]): string[] {
  const raw = process.env[name];
  if (!raw) {
    return fallback;
  }
  const items = raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : fallback;
}

/**
 * Load configuration from environment variables.
 */
export function loadConfig(): Config {
  const isPositive = (value: number) => value > 0;
  const isPort = (value: number) =>
    Number.isInteger(value) && value > 0 && value < 65536;

  const visibilityWindowMs = readNumber("SB_VISIBILITY_WINDOW_MS", 30_000);
  const retentionMs = readNumber("SB_RETENTION_MS", 60 * 60 * 1000);

  return {
    listenPort: readNumber("SB_LISTEN_PORT", 8080, isPort),
    pollIntervalMs: readNumber("SB_POLL_INTERVAL_MS", 2000, isPositive),
    cpuThreshold: readNumber("SB_CPU_THRESHOLD", 5),
    hysteresisSamples: readNumber("SB_HYSTERESIS_SAMPLES", 2, (value) =>
      Number.isInteger(value) && value >= 1
    ),
    visibilityWindowMs,
    retentionMs: retentionMs > 0 ? Math.max(retentionMs, visibilityWindowMs) : 0,
    externalTimeoutMs: readNumber("SB_EXTERNAL_TIMEOUT_MS", 5000, isPositive),
    agentNames: readList("SB_AGENT_NAMES", DEFAULT_AGENT_NAMES),
    discoveryName: process.env["SB_DISCOVERY_NAME"]?.trim() || "claude",
    recentDirsPath:
      process.env["SB_RECENT_DIRS_PATH"] ?? getDefaultRecentDirsPath(),
    maxRecentDirs: readNumber("SB_MAX_RECENT_DIRS", 10, (value) =>
      Number.isInteger(value) && value >= 1
    ),
    dbPath: process.env["SB_DB_PATH"] ?? getDefaultDbPath(),
    ascii: process.env["SB_ASCII"] === "1",
    debug: process.env["SB_DEBUG"] === "1",
  };
}
