/**
 * One group on the board: a header rule followed by its sessions.
 */

import React from "react";
import { Box, Text } from "ink";
import type { Session } from "@session-board/core";
import {
  elapsedMs,
  formatElapsed,
  indicator,
  isFlashing,
  statusLabel,
  type BoardGroup,
  type Glyphs,
} from "../board-model.js";
import { StatusBadge } from "./StatusBadge.js";

export const NAME_WIDTH = 34;
export const STATUS_WIDTH = 14;
export const TIME_WIDTH = 8;

export interface SessionGroupProps {
  group: BoardGroup;
  selectedId: string | null;
  now: number;
  glyphs: Glyphs;
  width: number;
}

function fit(text: string, width: number): string {
  return text.length > width ? `${text.slice(0, width - 1)}…` : text.padEnd(width);
}

function SessionRow({
  session,
  selected,
  now,
  glyphs,
}: {
  session: Session;
  selected: boolean;
  now: number;
  glyphs: Glyphs;
}): React.ReactElement {
  return (
    <Text inverse={isFlashing(session, now)}>
      <Text color="cyan">{selected ? `${glyphs.select} ` : "  "}</Text>
      <Text bold={selected}>{fit(session.name, NAME_WIDTH)}</Text>
      <Text> </Text>
      <StatusBadge
        status={session.status}
        glyph={indicator(session.status, now, glyphs)}
        label={statusLabel(session)}
        width={STATUS_WIDTH}
      />
      <Text dimColor>{formatElapsed(elapsedMs(session, now)).padStart(TIME_WIDTH)}</Text>
    </Text>
  );
}

export function SessionGroup({
  group,
  selectedId,
  now,
  glyphs,
  width,
}: SessionGroupProps): React.ReactElement {
  const title = `${glyphs.rule}${glyphs.rule} ${group.name} `;
  return (
    <Box flexDirection="column" marginBottom={1}>
      <Text bold>
        {title}
        <Text dimColor>{glyphs.rule.repeat(Math.max(0, width - title.length))}</Text>
      </Text>
      {group.sessions.map((session) => (
        <SessionRow
          key={session.id}
          session={session}
          selected={session.id === selectedId}
          now={now}
          glyphs={glyphs}
        />
      ))}
    </Box>
  );
}
