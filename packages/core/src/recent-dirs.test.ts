/**
 * Tests for the recent-directory list.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { RecentDirectories } from "./recent-dirs.js";
import { silentLogger } from "./logger.js";

describe("RecentDirectories", () => {
  let tempDir: string;
  let filePath: string;
  let projA: string;
  let projB: string;
  let projC: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "sb-recent-test-"));
    filePath = path.join(tempDir, "state", "recent-dirs");
    projA = path.join(tempDir, "a");
    projB = path.join(tempDir, "b");
    projC = path.join(tempDir, "c");
    for (const dir of [projA, projB, projC]) {
      fs.mkdirSync(dir);
    }
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function create(maxEntries = 10): RecentDirectories {
    return new RecentDirectories({ filePath, maxEntries, logger: silentLogger });
  }

  it("starts empty when the file does not exist", () => {
    expect(create().load()).toEqual([]);
  });

  it("drops missing directories, blanks and duplicates on load", () => {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(
      filePath,
      [projB, "", path.join(tempDir, "gone"), projA, projB].join("\n")
    );

    expect(create().load()).toEqual([projB, projA]);
  });

  it("promotes to the front and persists one path per line", () => {
    const recent = create();
    recent.load();
    recent.promote(projA);
    recent.promote(projB);
    const list = recent.promote(projA);

    expect(list).toEqual([projA, projB]);
    expect(fs.readFileSync(filePath, "utf-8")).toBe(`${projA}\n${projB}\n`);
  });

  it("caps the list at the configured size", () => {
    const recent = create(2);
    recent.promote(projA);
    recent.promote(projB);
    recent.promote(projC);

    expect(recent.list()).toEqual([projC, projB]);
  });

  it("survives a reload", () => {
    const first = create();
    first.promote(projA);
    first.promote(projC);

    expect(create().load()).toEqual([projC, projA]);
  });

  it("keeps the in-memory list when the file cannot be written", () => {
    // A directory where the file should be makes every write fail
    fs.mkdirSync(filePath, { recursive: true });
    const recent = create();

    expect(recent.promote(projA)).toEqual([projA]);
    expect(recent.list()).toEqual([projA]);
  });

  it("ignores blank paths", () => {
    expect(create().promote("   ")).toEqual([]);
  });
});
