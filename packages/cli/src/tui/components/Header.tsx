/**
 * Board header: title, summary and keyboard hints.
 */

import React from "react";
import { Box, Text } from "ink";

export interface KeyHint {
  key: string;
  label: string;
}

export interface HeaderProps {
  title: string;
  summary: string;
  hints?: KeyHint[];
  rule: string;
  width: number;
}

export function Header({
  title,
  summary,
  hints = [],
  rule,
  width,
}: HeaderProps): React.ReactElement {
  return (
    <Box flexDirection="column">
      <Box justifyContent="space-between">
        <Text>
          <Text bold>{title}</Text>
          <Text dimColor>  {summary}</Text>
        </Text>
        <Box>
          {hints.map((hint, i) => (
            <Text key={hint.key}>
              <Text color="cyan">[{hint.key}]</Text>{" "}
              <Text dimColor>{hint.label}</Text>
              {i < hints.length - 1 ? "  " : ""}
            </Text>
          ))}
        </Box>
      </Box>
      <Text dimColor>{rule.repeat(width)}</Text>
    </Box>
  );
}
