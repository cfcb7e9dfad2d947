/**
 * Most-recently-used working directories.
 * Persisted as a plain text file, one absolute path per line, newest first.
 * File errors never propagate: the in-memory list stays authoritative.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { createLogger, errorMessage, type Logger } from "./logger.js";

export interface RecentDirectoriesOptions {
  filePath: string;
  /** Maximum entries kept (default: 10) */
  maxEntries?: number;
  /** Directory existence check used when loading */
  exists?: (dir: string) => boolean;
  logger?: Logger;
}

function directoryExists(dir: string): boolean {
  try {
    return fs.statSync(dir).isDirectory();
  } catch {
    return false;
  }
}

export class RecentDirectories {
  private readonly filePath: string;
  private readonly maxEntries: number;
  private readonly exists: (dir: string) => boolean;
  private readonly logger: Logger;
  private entries: string[] = [];

  constructor(options: RecentDirectoriesOptions) {
    this.filePath = options.filePath;
    this.maxEntries = Math.max(1, options.maxEntries ?? 10);
    this.exists = options.exists ?? directoryExists;
    this.logger = options.logger ?? createLogger("RecentDirs");
  }

  /**
   * Read the file, dropping blanks, duplicates and directories that no
   * longer exist. A missing file yields an empty list.
   */
  load(): string[] {
    let content: string;
    try {
      content = fs.readFileSync(this.filePath, "utf-8");
    } catch (error) {
      const err = error as { code?: string };
      if (err.code !== "ENOENT") {
        this.logger.warn(`could not read ${this.filePath}: ${errorMessage(error)}`);
      }
      this.entries = [];
      return this.list();
    }

    const seen = new Set<string>();
    const entries: string[] = [];
    for (const line of content.split(/\r?\n/)) {
      const dir = line.trim();
      if (!dir || seen.has(dir) || !this.exists(dir)) continue;
      seen.add(dir);
      entries.push(dir);
      if (entries.length >= this.maxEntries) break;
    }
    this.entries = entries;
    return this.list();
  }

  list(): string[] {
    return [...this.entries];
  }

  /** Move dir to the front (adding it if new) and rewrite the file */
  promote(dir: string): string[] {
    const trimmed = dir.trim();
    if (!trimmed) {
      return this.list();
    }
    const resolved = path.resolve(trimmed);
    this.entries = [resolved, ...this.entries.filter((entry) => entry !== resolved)].slice(
      0,
      this.maxEntries
    );
    this.save();
    return this.list();
  }

  private save(): void {
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(this.filePath, this.entries.join("\n") + "\n", "utf-8");
    } catch (error) {
      this.logger.warn(`could not write ${this.filePath}: ${errorMessage(error)}`);
    }
  }
}
