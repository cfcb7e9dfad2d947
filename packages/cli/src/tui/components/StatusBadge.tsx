/**
 * Status glyph and label for a session row.
 */

import React from "react";
import { Text } from "ink";
import type { SessionStatus } from "@session-board/core";

const STATUS_COLORS: Record<SessionStatus, string> = {
  RUNNING: "green",
  IDLE: "yellow",
  DONE: "gray",
  KILLED: "magenta",
  FAILED: "red",
};

export interface StatusBadgeProps {
  status: SessionStatus;
  glyph: string;
  label: string;
  width: number;
}

export function StatusBadge({
  status,
  glyph,
  label,
  width,
}: StatusBadgeProps): React.ReactElement {
  return (
    <Text color={STATUS_COLORS[status]}>
      {`${glyph} ${label}`.padEnd(width)}
    </Text>
  );
}
