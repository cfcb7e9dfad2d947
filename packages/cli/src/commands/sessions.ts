/**
 * Sessions commands - list, show and kill tracked sessions.
 */

import { isSessionStatus } from "@session-board/core";
import { formatSessionDetails, formatSessionTable } from "../format.js";
import { daemonClient, fail } from "./shared.js";

export interface SessionsListOptions {
  status?: string;
  json?: boolean;
}

export async function sessionsListCommand(options: SessionsListOptions = {}): Promise<void> {
  const wanted = options.status?.toUpperCase();
  if (wanted !== undefined && !isSessionStatus(wanted)) {
    console.error(`Unknown status: ${options.status}`);
    process.exit(1);
  }

  try {
    const sessions = (await daemonClient().listSessions()).filter(
      (session) => wanted === undefined || session.status === wanted
    );
    console.log(
      options.json ? JSON.stringify(sessions, null, 2) : formatSessionTable(sessions, Date.now())
    );
  } catch (error) {
    fail(error);
  }
}

export async function sessionsShowCommand(id: string): Promise<void> {
  try {
    const session = await daemonClient().getSession(id);
    if (!session) {
      console.error(`Session not found: ${id}`);
      process.exit(1);
    }
    console.log(formatSessionDetails(session));
  } catch (error) {
    fail(error);
  }
}

export async function sessionsKillCommand(id: string): Promise<void> {
  try {
    const result = await daemonClient().killSession(id);
    if (!result.ok) {
      console.error(
        result.error === "not found"
          ? `Session not found: ${id}`
          : `Session ${id} has already finished`
      );
      process.exit(1);
    }
    console.log(`Killed ${result.session.name} (${result.session.id})`);
  } catch (error) {
    fail(error);
  }
}
