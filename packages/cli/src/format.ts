/**
 * Plain-text tables for the non-interactive commands.
 */

import type { HistoryEntry, Session } from "@session-board/core";
import { elapsedMs, formatElapsed, statusLabel } from "./tui/board-model.js";

function row(cells: Array<[string, number]>): string {
  return cells
    .map(([text, width], i) => (i === cells.length - 1 ? text : text.padEnd(width)))
    .join("")
    .trimEnd();
}

export function formatSessionTable(sessions: Session[], now: number): string {
  if (sessions.length === 0) {
    return "No sessions.";
  }
  const lines = [
    row([
      ["ID", 38],
      ["NAME", 28],
      ["GROUP", 16],
      ["STATUS", 14],
      ["TIME", 0],
    ]),
  ];
  for (const session of sessions) {
    lines.push(
      row([
        [session.id, 38],
        [session.name, 28],
        [session.group, 16],
        [statusLabel(session), 14],
        [formatElapsed(elapsedMs(session, now)), 0],
      ])
    );
  }
  return lines.join("\n");
}

export function formatSessionDetails(session: Session): string {
  const field = (label: string, value: string | number | null): string =>
    `${`${label}:`.padEnd(14)}${value ?? "-"}`;
  return [
    field("ID", session.id),
    field("Name", session.name),
    field("Status", statusLabel(session)),
    field("Group", session.group),
    field("Directory", session.workingDirectory),
    field("Shell PID", session.shellPid),
    field("Agent PID", session.agentPid),
    field("Created", session.createdAt),
    field("Work started", session.workStartedAt),
    field("Finished", session.finishedAt),
    field("Exit code", session.exitCode),
  ].join("\n");
}

export function formatHistoryTable(entries: HistoryEntry[]): string {
  if (entries.length === 0) {
    return "No archived sessions.";
  }
  const lines = [
    row([
      ["FINISHED", 26],
      ["STATUS", 8],
      ["EXIT", 6],
      ["GROUP", 16],
      ["NAME", 0],
    ]),
  ];
  for (const entry of entries) {
    lines.push(
      row([
        [entry.finishedAt, 26],
        [entry.status, 8],
        [entry.exitCode === null ? "-" : String(entry.exitCode), 6],
        [entry.group, 16],
        [entry.name, 0],
      ])
    );
  }
  return lines.join("\n");
}

/** 42s, 5m 3s, 2h 10m */
export function formatUptime(seconds: number): string {
  if (seconds < 60) {
    return `${Math.floor(seconds)}s`;
  }
  if (seconds < 3600) {
    return `${Math.floor(seconds / 60)}m ${Math.floor(seconds % 60)}s`;
  }
  return `${Math.floor(seconds / 3600)}h ${Math.floor((seconds % 3600) / 60)}m`;
}
