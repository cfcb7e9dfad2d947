/**
 * The live board: groups of sessions, a scrolling ticker and the kill and
 * filter prompts.
 */

import React, { useState, useEffect, useCallback, useRef } from "react";
import { Box, Text, useInput, useApp } from "ink";
import TextInput from "ink-text-input";
import { Header, SessionGroup, Spinner } from "../components/index.js";
import {
  buildBoard,
  buildTicker,
  canKill,
  clampSelection,
  summaryLine,
  tickerWindow,
  type Glyphs,
} from "../board-model.js";
import type { BoardSnapshot, BoardSource } from "../source.js";

const POLL_MS = 1000;
const FRAME_MS = 250;
const WIDTH = 66;

export interface BoardScreenProps {
  source: BoardSource;
  glyphs: Glyphs;
  ascii: boolean;
  visibilityWindowMs: number;
}

type Mode = "browse" | "filter" | "confirm";

function errorText(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function BoardScreen({
  source,
  glyphs,
  ascii,
  visibilityWindowMs,
}: BoardScreenProps): React.ReactElement {
  const { exit } = useApp();

  const [snapshot, setSnapshot] = useState<BoardSnapshot | null>(null);
  const [error, setError] = useState<string | null>(null);
  const [now, setNow] = useState(() => Date.now());
  const [frame, setFrame] = useState(0);
  const [mode, setMode] = useState<Mode>("browse");
  const [filter, setFilter] = useState("");
  const [selectedId, setSelectedId] = useState<string | null>(null);
  const [message, setMessage] = useState<string | null>(null);
  const loading = useRef(false);

  const refresh = useCallback(async () => {
    if (loading.current) return;
    loading.current = true;
    try {
      setSnapshot(await source.load());
      setError(null);
    } catch (err) {
      setError(errorText(err));
    } finally {
      loading.current = false;
    }
  }, [source]);

  useEffect(() => {
    void refresh();
    const timer = setInterval(() => void refresh(), POLL_MS);
    return () => clearInterval(timer);
  }, [refresh]);

  useEffect(() => {
    const timer = setInterval(() => {
      setNow(Date.now());
      setFrame((prev) => prev + 1);
    }, FRAME_MS);
    return () => clearInterval(timer);
  }, []);

  const board = buildBoard(snapshot?.sessions ?? [], {
    now,
    visibilityWindowMs,
    filter,
  });
  const rows = board.rows;
  const found = rows.findIndex((session) => session.id === selectedId);
  const selectedIndex = clampSelection(found === -1 ? 0 : found, rows.length);
  const selected = rows[selectedIndex] ?? null;

  const move = (delta: number): void => {
    const next = rows[clampSelection(selectedIndex + delta, rows.length)];
    setSelectedId(next ? next.id : null);
  };

  const confirmKill = async (): Promise<void> => {
    if (!selected) return;
    const { id, name } = selected;
    try {
      const result = await source.kill(id);
      setMessage(result.ok ? `Killed ${name}` : `Could not kill ${name}: ${result.error}`);
    } catch (err) {
      setMessage(`Could not kill ${name}: ${errorText(err)}`);
    }
    await refresh();
  };

  useInput((input, key) => {
    if (mode === "filter") {
      if (key.escape) {
        setFilter("");
        setMode("browse");
      } else if (key.return) {
        setMode("browse");
      }
      return;
    }

    if (mode === "confirm") {
      if (input === "y" || input === "Y") {
        setMode("browse");
        void confirmKill();
      } else {
        setMessage(null);
        setMode("browse");
      }
      return;
    }

    if (input === "q" || key.escape) {
      exit();
    } else if (input === "/") {
      setMode("filter");
    } else if (input === "k" && canKill(selected)) {
      setMessage(null);
      setMode("confirm");
    } else if (key.upArrow) {
      move(-1);
    } else if (key.downArrow) {
      move(1);
    }
  });

  const hints =
    mode === "browse"
      ? [
          ...(canKill(selected) ? [{ key: "k", label: "kill" }] : []),
          { key: "/", label: "filter" },
          { key: "q", label: "quit" },
        ]
      : [];

  const ticker = tickerWindow(
    buildTicker(rows, {
      now,
      totalCreated: snapshot?.totalCreated ?? 0,
      glyphs,
    }),
    frame,
    WIDTH
  );

  return (
    <Box flexDirection="column">
      <Header
        title="Session Board"
        summary={summaryLine(rows)}
        hints={hints}
        rule={glyphs.rule}
        width={WIDTH}
      />

      <Box marginTop={1} flexDirection="column">
        {snapshot === null && error === null ? (
          <Spinner label="Loading sessions..." ascii={ascii} />
        ) : rows.length === 0 ? (
          <Text dimColor>{filter ? "No matching sessions" : "No sessions"}</Text>
        ) : (
          board.groups.map((group) => (
            <SessionGroup
              key={group.name}
              group={group}
              selectedId={selected ? selected.id : null}
              now={now}
              glyphs={glyphs}
              width={WIDTH}
            />
          ))
        )}
      </Box>

      {error && <Text color="red">Error: {error}</Text>}

      {mode === "filter" && (
        <Box>
          <Text>Filter: </Text>
          <TextInput value={filter} onChange={setFilter} placeholder="name or group..." />
          <Text dimColor> (Enter to keep, Esc to clear)</Text>
        </Box>
      )}

      {mode === "confirm" && selected && (
        <Text color="yellow">
          Kill {selected.name}? [y/N]
        </Text>
      )}

      {mode === "browse" && message && <Text>{message}</Text>}

      <Box marginTop={1}>
        <Text dimColor>{ticker}</Text>
      </Box>
      <Text dimColor>
        {glyphs.arrow} {source.label}
        {filter && mode !== "filter" ? `  filter: ${filter}` : ""}
      </Text>
    </Box>
  );
}
