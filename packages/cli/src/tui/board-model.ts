/**
 * Pure board model: which sessions are visible, how they are grouped and
 * ordered, and the text shown around them. No I/O and no clock reads; the
 * caller passes `now`.
 */

import {
  isActiveStatus,
  isTerminalStatus,
  type Session,
  type SessionStatus,
} from "@session-board/core";

/** Display order inside a group, and the key groups are ranked by */
export const STATUS_ORDER: Record<SessionStatus, number> = {
  RUNNING: 0,
  IDLE: 1,
  DONE: 2,
  KILLED: 3,
  FAILED: 4,
};

/** How long a row stays highlighted after its status changed */
export const FLASH_MS = 2000;

export interface BoardGroup {
  name: string;
  sessions: Session[];
}

export interface Board {
  groups: BoardGroup[];
  /** Sessions in display order; selection indexes into this list */
  rows: Session[];
}

export interface BoardOptions {
  now: number;
  visibilityWindowMs: number;
  /** Case-insensitive substring matched against name and group */
  filter?: string;
}

function ms(iso: string | null): number | null {
  return iso === null ? null : Date.parse(iso);
}

/**
 * Active sessions, plus finished ones still inside the visibility window.
 */
export function isVisible(session: Session, now: number, visibilityWindowMs: number): boolean {
  if (isActiveStatus(session.status)) {
    return true;
  }
  const finishedAt = ms(session.finishedAt);
  return finishedAt !== null && now - finishedAt < visibilityWindowMs;
}

function matchesFilter(session: Session, filter: string | undefined): boolean {
  const needle = filter?.trim().toLowerCase();
  if (!needle) {
    return true;
  }
  return (
    session.name.toLowerCase().includes(needle) ||
    session.group.toLowerCase().includes(needle)
  );
}

export function buildBoard(sessions: Session[], options: BoardOptions): Board {
  const byGroup = new Map<string, Session[]>();
  for (const session of sessions) {
    if (!isVisible(session, options.now, options.visibilityWindowMs)) continue;
    if (!matchesFilter(session, options.filter)) continue;
    const list = byGroup.get(session.group) ?? [];
    list.push(session);
    byGroup.set(session.group, list);
  }

  const groups: BoardGroup[] = [];
  for (const [name, list] of byGroup) {
    // Array.prototype.sort is stable: equal statuses keep registration order
    list.sort((a, b) => STATUS_ORDER[a.status] - STATUS_ORDER[b.status]);
    groups.push({ name, sessions: list });
  }

  const rank = (group: BoardGroup): number =>
    Math.min(...group.sessions.map((s) => STATUS_ORDER[s.status]));
  groups.sort((a, b) => {
    const byStatus = rank(a) - rank(b);
    if (byStatus !== 0) return byStatus;
    const an = a.name.toLowerCase();
    const bn = b.name.toLowerCase();
    return an < bn ? -1 : an > bn ? 1 : 0;
  });

  return { groups, rows: groups.flatMap((group) => group.sessions) };
}

/** 12s, 3m05s, 1h02m */
export function formatElapsed(elapsedMs: number): string {
  const total = Math.max(0, Math.floor(elapsedMs / 1000));
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const seconds = total % 60;
  if (hours > 0) {
    return `${hours}h${String(minutes).padStart(2, "0")}m`;
  }
  if (minutes > 0) {
    return `${minutes}m${String(seconds).padStart(2, "0")}s`;
  }
  return `${seconds}s`;
}

/**
 * Time shown in the TIME column: time in the current burst of work while
 * RUNNING, time since registration while IDLE, total lifetime once finished.
 */
export function elapsedMs(session: Session, now: number): number {
  const created = Date.parse(session.createdAt);
  switch (session.status) {
    case "RUNNING":
      return now - (ms(session.workStartedAt) ?? created);
    case "IDLE":
      return now - created;
    default:
      return (ms(session.finishedAt) ?? now) - created;
  }
}

export function statusLabel(session: Session): string {
  switch (session.status) {
    case "RUNNING":
      return "Running";
    case "IDLE":
      return "Waiting";
    case "DONE":
      return "Complete";
    case "KILLED":
      return "Killed";
    case "FAILED":
      return session.exitCode === null ? "Failed" : `Failed (${session.exitCode})`;
  }
}

export function isFlashing(session: Session, now: number): boolean {
  return now - Date.parse(session.statusChangedAt) < FLASH_MS;
}

export interface Glyphs {
  runningOn: string;
  runningOff: string;
  idle: string;
  done: string;
  failed: string;
  killed: string;
  arrow: string;
  dot: string;
  select: string;
  rule: string;
}

export const UNICODE_GLYPHS: Glyphs = {
  runningOn: "●",
  runningOff: "○",
  idle: "○",
  done: "✓",
  failed: "✗",
  killed: "☠",
  arrow: "▶",
  dot: "▪",
  select: "▸",
  rule: "─",
};

export const ASCII_GLYPHS: Glyphs = {
  runningOn: "*",
  runningOff: "o",
  idle: "o",
  done: "V",
  failed: "X",
  killed: "#",
  arrow: ">",
  dot: ".",
  select: ">",
  rule: "-",
};

/** Status glyph; running sessions blink twice a second */
export function indicator(status: SessionStatus, now: number, glyphs: Glyphs): string {
  switch (status) {
    case "RUNNING":
      return Math.floor(now / 500) % 2 === 0 ? glyphs.runningOn : glyphs.runningOff;
    case "IDLE":
      return glyphs.idle;
    case "DONE":
      return glyphs.done;
    case "FAILED":
      return glyphs.failed;
    case "KILLED":
      return glyphs.killed;
  }
}

export function summaryLine(rows: Session[]): string {
  const running = rows.filter((s) => s.status === "RUNNING").length;
  const idle = rows.filter((s) => s.status === "IDLE").length;
  const parts: string[] = [];
  if (running) parts.push(`${running} running`);
  if (idle) parts.push(`${idle} waiting`);
  return parts.length > 0 ? parts.join("  ") : "All quiet";
}

export interface TickerOptions {
  now: number;
  totalCreated: number;
  glyphs: Glyphs;
}

export function buildTicker(rows: Session[], options: TickerOptions): string {
  const { dot } = options.glyphs;
  const parts = [`Sessions are auto-detected ${dot} Status updates every 2s`];

  if (options.totalCreated > 0) {
    parts.push(`${options.totalCreated} total sessions`);
  }

  let last: Session | null = null;
  for (const session of rows) {
    if (!isTerminalStatus(session.status) || session.finishedAt === null) continue;
    if (last === null || Date.parse(session.finishedAt) > Date.parse(last.finishedAt ?? "")) {
      last = session;
    }
  }
  if (last?.finishedAt) {
    const ago = Math.max(0, Math.floor((options.now - Date.parse(last.finishedAt)) / 1000));
    const agoText = ago < 60 ? `${ago}s ago` : `${Math.floor(ago / 60)}m ago`;
    parts.push(`last done: ${last.name.slice(0, 16)} ${agoText}`);
  }

  const running = rows.filter((s) => s.status === "RUNNING").length;
  if (running) {
    parts.push(`${running} active now`);
  }

  return parts.join(` ${dot} `);
}

/** The slice of a looping ticker visible at a given scroll offset */
export function tickerWindow(text: string, offset: number, width: number): string {
  if (width <= 0 || text.length === 0) {
    return "";
  }
  const padded = `${text}   `;
  const start = offset % padded.length;
  let window = padded.slice(start);
  while (window.length < width) {
    window += padded;
  }
  return window.slice(0, width);
}

/** Keep a selection index inside the row list */
export function clampSelection(index: number, rowCount: number): number {
  if (rowCount === 0) return 0;
  return Math.max(0, Math.min(index, rowCount - 1));
}

/** Only running or idle rows can be killed */
export function canKill(session: Session | null): boolean {
  return session !== null && isActiveStatus(session.status);
}
