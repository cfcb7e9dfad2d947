/**
 * @session-board/service
 *
 * Local daemon for Session Board.
 * Discovers running sessions, monitors their activity and serves the
 * registration API on localhost.
 */

import {
  ActivityMonitor,
  RecentDirectories,
  SessionRegistry,
  SystemProcessTree,
  createLogger,
  discoverSessions,
  errorMessage,
  getDefaultMigrationsDir,
  loadConfig,
  openDatabase,
  runMigrations,
  acquireLock,
  getDaemonPaths,
  installTimestampLogging,
  releaseLock,
  removeStateFile,
  writePidFile,
  writePortFile,
  type Config,
  type DaemonPaths,
  type Logger,
  type ProcessTree,
} from "@session-board/core";
import type Database from "better-sqlite3";
import type { FastifyInstance } from "fastify";
import { archivePruned } from "./retention.js";
import { createServer, startServer } from "./server.js";

export { createServer, startServer, type CreateServerOptions } from "./server.js";
export { archivePruned } from "./retention.js";

export interface EngineOptions {
  config?: Config;
  logger?: Logger;
  /** Fastify request logging (default: true) */
  httpLogging?: boolean;
  /** Skip the HTTP listener, for the board's in-process mode */
  listen?: boolean;
  /** Install SIGINT/SIGTERM handlers (default: true) */
  handleSignals?: boolean;
  /** Runs once after the engine has stopped, whether or not that succeeded */
  onClose?: () => void;
}

export interface EngineHandle {
  registry: SessionRegistry;
  tree: ProcessTree;
  recentDirs: Pick<RecentDirectories, "list" | "promote">;
  db: Database.Database | null;
  app: FastifyInstance | null;
  config: Config;
  shutdown: () => Promise<void>;
}

/** Open the history archive; the daemon runs without it when that fails */
function openHistory(config: Config, logger: Logger): Database.Database | null {
  try {
    const db = openDatabase(config.dbPath);
    runMigrations(db, getDefaultMigrationsDir(), logger);
    return db;
  } catch (error) {
    logger.warn(`history archive unavailable (${config.dbPath}): ${errorMessage(error)}`);
    return null;
  }
}

/**
 * Start the engine: discovery, then the monitor loop, then the API, then
 * the retention timer that archives pruned sessions.
 */
export async function startEngine(options: EngineOptions = {}): Promise<EngineHandle> {
  const config = options.config ?? loadConfig();
  const logger = options.logger ?? createLogger("Daemon");
  const scoped = (scope: string): Logger => options.logger ?? createLogger(scope);

  const registry = new SessionRegistry();
  const tree = new SystemProcessTree({
    timeoutMs: config.externalTimeoutMs,
    logger: scoped("ProcessTree"),
  });
  const recentDirs = new RecentDirectories({
    filePath: config.recentDirsPath,
    maxEntries: config.maxRecentDirs,
    logger: scoped("RecentDirs"),
  });
  recentDirs.load();
  const db = openHistory(config, scoped("DB"));

  await discoverSessions({
    registry,
    tree,
    recentDirs,
    agentName: config.discoveryName,
    logger: scoped("Discovery"),
  });

  const monitor = new ActivityMonitor({
    registry,
    tree,
    pollIntervalMs: config.pollIntervalMs,
    hysteresis: {
      threshold: config.cpuThreshold,
      samples: config.hysteresisSamples,
    },
    agentNames: config.agentNames,
    logger: scoped("Monitor"),
  });
  monitor.start();

  let app: FastifyInstance | null = null;
  if (options.listen ?? true) {
    app = await createServer({
      registry,
      tree,
      db,
      recentDirs,
      logger: options.httpLogging ?? true,
    });
    try {
      await startServer(app, config.listenPort);
    } catch (error) {
      await monitor.stop();
      await app.close();
      db?.close();
      throw error;
    }
    logger.info(`listening on http://127.0.0.1:${config.listenPort}`);
  }

  const archive = (): void => {
    archivePruned(registry, db, config.retentionMs, logger);
  };
  const pruneTimer =
    config.retentionMs > 0
      ? setInterval(archive, Math.min(config.retentionMs, 60_000))
      : null;
  pruneTimer?.unref();

  let closing: Promise<void> | null = null;
  const shutdown = (): Promise<void> => {
    closing ??= (async () => {
      try {
        if (pruneTimer) clearInterval(pruneTimer);
        await monitor.stop();
        if (app) await app.close();
        db?.close();
      } finally {
        options.onClose?.();
      }
    })();
    return closing;
  };

  if (options.handleSignals ?? true) {
    const onSignal = (): void => {
      logger.info("shutting down");
      shutdown().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error(`shutdown failed: ${errorMessage(error)}`);
          process.exit(1);
        }
      );
    };
    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);
  }

  return { registry, tree, recentDirs, db, app, config, shutdown };
}

export class DaemonAlreadyRunningError extends Error {
  constructor(readonly pid: number | null, detail?: string) {
    super(
      pid === null
        ? `Could not acquire daemon lock: ${detail ?? "unknown error"}`
        : `Daemon is already running (PID ${pid})`
    );
    this.name = "DaemonAlreadyRunningError";
  }
}

/**
 * Start the daemon with configuration from the environment.
 * Holds the single-instance lock and the PID and port files until shutdown.
 */
export async function startDaemon(paths: DaemonPaths = getDaemonPaths()): Promise<EngineHandle> {
  const config = loadConfig();
  const logger = createLogger("Daemon");

  const lock = acquireLock(paths.lockFile, { pidPath: paths.pidFile });
  if (!lock.acquired) {
    throw new DaemonAlreadyRunningError(lock.existingPid ?? null, lock.error);
  }

  logger.info("starting Session Board daemon");
  logger.info(`history database: ${config.dbPath}`);
  logger.info(`API port: ${config.listenPort}`);

  const removeStateFiles = (): void => {
    removeStateFile(paths.pidFile);
    removeStateFile(paths.portFile);
    releaseLock(paths.lockFile);
  };

  let engine: EngineHandle;
  try {
    engine = await startEngine({ config, logger, onClose: removeStateFiles });
  } catch (error) {
    releaseLock(paths.lockFile);
    throw error;
  }

  writePidFile(process.pid, paths.pidFile);
  writePortFile(config.listenPort, paths.portFile);
  return engine;
}

// Run if executed directly
const isMainModule = import.meta.url === `file://${process.argv[1]}`;
if (isMainModule) {
  installTimestampLogging();
  startDaemon().catch((error: unknown) => {
    console.error("Failed to start daemon:", errorMessage(error));
    process.exit(1);
  });
}
