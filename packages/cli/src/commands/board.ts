/**
 * Board command - the live terminal board.
 */

import { loadConfig } from "@session-board/core";
import { startEngine } from "@session-board/service";
import { HttpBoardSource, LocalBoardSource, type BoardSource } from "../tui/source.js";
import { daemonClient, fail } from "./shared.js";

export interface BoardCommandOptions {
  local?: boolean;
  ascii?: boolean;
}

export async function boardCommand(options: BoardCommandOptions = {}): Promise<void> {
  const config = loadConfig();

  let source: BoardSource;
  if (options.local) {
    source = await LocalBoardSource.start(startEngine);
  } else {
    const client = daemonClient();
    try {
      await client.health();
    } catch (error) {
      fail(error);
    }
    source = new HttpBoardSource(client);
  }

  // Dynamic imports to avoid loading React unless needed
  const { render } = await import("ink");
  const React = await import("react");
  const { App } = await import("../tui/App.js");

  const { waitUntilExit } = render(
    React.createElement(App, {
      source,
      ascii: options.ascii ?? config.ascii,
      visibilityWindowMs: config.visibilityWindowMs,
    })
  );

  try {
    await waitUntilExit();
  } finally {
    await source.close();
  }
}
