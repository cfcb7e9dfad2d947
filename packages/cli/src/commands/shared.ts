/**
 * Helpers shared by the commands that talk to the daemon.
 */

import { checkDaemonStatus, loadConfig } from "@session-board/core";
import { DaemonClient, DaemonRequestError } from "../client.js";

/** Client for the running daemon; the port file wins over SB_LISTEN_PORT */
export function daemonClient(): DaemonClient {
  const { port } = checkDaemonStatus();
  return DaemonClient.forPort(port ?? loadConfig().listenPort);
}

/** Print a failed request and exit */
export function fail(error: unknown): never {
  if (error instanceof DaemonRequestError && error.statusCode === null) {
    console.error(`${error.message}. Start it with: session-board start --daemon`);
  } else {
    console.error(error instanceof Error ? error.message : String(error));
  }
  process.exit(1);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
