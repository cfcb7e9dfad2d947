/**
 * Tests for the session history archive.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type Database from "better-sqlite3";
import {
  archiveSessions,
  countHistory,
  getDefaultMigrationsDir,
  listHistory,
  openMemoryDatabase,
  runMigrations,
} from "./index.js";
import { silentLogger } from "../logger.js";
import type { Session } from "../types/index.js";

function finished(overrides: Partial<Session> & Pick<Session, "id">): Session {
  return {
    name: overrides.id,
    status: "DONE",
    shellPid: 100,
    agentPid: 101,
    workingDirectory: "/home/u/proj",
    group: "proj",
    createdAt: "2026-03-01T10:00:00.000Z",
    workStartedAt: "2026-03-01T10:00:05.000Z",
    finishedAt: "2026-03-01T10:05:00.000Z",
    exitCode: 0,
    cpuHighStreak: 0,
    cpuLowStreak: 2,
    lastCpuPercent: 0.4,
    statusChangedAt: "2026-03-01T10:05:00.000Z",
    ...overrides,
  };
}

const ARCHIVED_AT = "2026-03-01T12:00:00.000Z";

describe("session history", () => {
  let db: Database.Database;

  beforeEach(() => {
    db = openMemoryDatabase();
    runMigrations(db, getDefaultMigrationsDir(), silentLogger);
  });

  afterEach(() => {
    db.close();
  });

  it("applies each migration once", () => {
    expect(runMigrations(db, getDefaultMigrationsDir(), silentLogger)).toEqual([]);
  });

  it("archives finished sessions and reads them back newest first", () => {
    const written = archiveSessions(
      db,
      [
        finished({ id: "a", finishedAt: "2026-03-01T10:05:00.000Z" }),
        finished({
          id: "b",
          status: "KILLED",
          exitCode: -15,
          workStartedAt: null,
          workingDirectory: null,
          group: "General",
          finishedAt: "2026-03-01T11:00:00.000Z",
        }),
      ],
      ARCHIVED_AT
    );

    expect(written).toBe(2);
    expect(listHistory(db)).toEqual([
      {
        id: "b",
        name: "b",
        status: "KILLED",
        group: "General",
        workingDirectory: null,
        exitCode: -15,
        createdAt: "2026-03-01T10:00:00.000Z",
        workStartedAt: null,
        finishedAt: "2026-03-01T11:00:00.000Z",
        archivedAt: ARCHIVED_AT,
      },
      {
        id: "a",
        name: "a",
        status: "DONE",
        group: "proj",
        workingDirectory: "/home/u/proj",
        exitCode: 0,
        createdAt: "2026-03-01T10:00:00.000Z",
        workStartedAt: "2026-03-01T10:00:05.000Z",
        finishedAt: "2026-03-01T10:05:00.000Z",
        archivedAt: ARCHIVED_AT,
      },
    ]);
  });

  it("skips sessions that are still active", () => {
    const written = archiveSessions(
      db,
      [finished({ id: "live", status: "RUNNING", finishedAt: null })],
      ARCHIVED_AT
    );
    expect(written).toBe(0);
    expect(countHistory(db)).toBe(0);
  });

  it("filters by status and group and honours the limit", () => {
    archiveSessions(
      db,
      [
        finished({ id: "a", finishedAt: "2026-03-01T10:01:00.000Z" }),
        finished({ id: "b", status: "FAILED", exitCode: 1, finishedAt: "2026-03-01T10:02:00.000Z" }),
        finished({ id: "c", group: "other", finishedAt: "2026-03-01T10:03:00.000Z" }),
      ],
      ARCHIVED_AT
    );

    expect(listHistory(db, { status: "FAILED" }).map((e) => e.id)).toEqual(["b"]);
    expect(listHistory(db, { group: "proj" }).map((e) => e.id)).toEqual(["b", "a"]);
    expect(listHistory(db, { limit: 1 }).map((e) => e.id)).toEqual(["c"]);
  });

  it("keeps every run of a re-registered id and ignores repeats", () => {
    archiveSessions(db, [finished({ id: "a" })], ARCHIVED_AT);
    const again = archiveSessions(db, [finished({ id: "a", name: "renamed" })], ARCHIVED_AT);
    const rerun = archiveSessions(
      db,
      [finished({ id: "a", name: "second run", finishedAt: "2026-03-01T11:30:00.000Z" })],
      ARCHIVED_AT
    );

    expect(again).toBe(0);
    expect(rerun).toBe(1);
    expect(countHistory(db)).toBe(2);
    expect(listHistory(db).map((e) => e.name)).toEqual(["second run", "a"]);
  });
});
