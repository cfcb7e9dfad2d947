/**
 * Recent command - most recently used working directories, newest first.
 */

import { RecentDirectories, loadConfig, silentLogger } from "@session-board/core";
import { DaemonRequestError } from "../client.js";
import { daemonClient, fail } from "./shared.js";

export async function recentCommand(): Promise<void> {
  let dirs: string[];
  try {
    dirs = await daemonClient().recentDirectories();
  } catch (error) {
    if (!(error instanceof DaemonRequestError) || error.statusCode !== null) {
      fail(error);
    }
    // No daemon: the file is still there to read
    const config = loadConfig();
    const recent = new RecentDirectories({
      filePath: config.recentDirsPath,
      maxEntries: config.maxRecentDirs,
      logger: silentLogger,
    });
    recent.load();
    dirs = recent.list();
  }

  for (const dir of dirs) {
    console.log(dir);
  }
}
