#!/usr/bin/env node
/**
 * @session-board/cli
 *
 * CLI for Session Board.
 * Commands: start, stop, status, board, sessions, history, recent
 */

import { Command } from "commander";
import { startCommand } from "./commands/start.js";
import { stopCommand } from "./commands/stop.js";
import { statusCommand } from "./commands/status.js";
import { boardCommand } from "./commands/board.js";
import {
  sessionsKillCommand,
  sessionsListCommand,
  sessionsShowCommand,
} from "./commands/sessions.js";
import { historyCommand } from "./commands/history.js";
import { recentCommand } from "./commands/recent.js";

const program = new Command();

program
  .name("session-board")
  .description("Live board of interactive agent sessions running in your terminals")
  .version("0.1.0");

program
  .command("start")
  .description("Start the daemon")
  .option("-e, --env-file <path>", "Load environment variables from file")
  .option("-d, --daemon", "Run in background (daemon mode)")
  .option("-f, --force", "Force restart if already running")
  .action(async (options) => {
    await startCommand(options);
  });

program
  .command("stop")
  .description("Stop the daemon")
  .option("-f, --force", "Force kill if not responding")
  .action(async (options) => {
    await stopCommand(options);
  });

program
  .command("status")
  .description("Show daemon status")
  .action(async () => {
    await statusCommand();
  });

program
  .command("board")
  .description("Live session board")
  .option("-l, --local", "Run discovery and monitoring in this process instead of the daemon")
  .option("-a, --ascii", "Use ASCII glyphs")
  .action(async (options) => {
    await boardCommand(options);
  });

// Sessions subcommand group
const sessions = program.command("sessions").description("Inspect tracked sessions");

sessions
  .command("list")
  .description("List tracked sessions")
  .option("-s, --status <status>", "Filter by status (idle|running|done|failed|killed)")
  .option("--json", "Output as JSON")
  .action(async (options) => {
    await sessionsListCommand(options);
  });

sessions
  .command("show <id>")
  .description("Show session details")
  .action(async (id: string) => {
    await sessionsShowCommand(id);
  });

sessions
  .command("kill <id>")
  .description("Terminate a session's process tree")
  .action(async (id: string) => {
    await sessionsKillCommand(id);
  });

program
  .command("history")
  .description("Show archived sessions, newest first")
  .option("-n, --limit <n>", "Maximum number of entries (default 50)")
  .option("-s, --status <status>", "Filter by status (done|failed|killed)")
  .option("-g, --group <group>", "Filter by group")
  .option("--json", "Output as JSON")
  .action(async (options) => {
    await historyCommand(options);
  });

program
  .command("recent")
  .description("List recently used working directories")
  .action(async () => {
    await recentCommand();
  });

program.parse();
