/**
 * Loading spinner shown until the first snapshot arrives.
 */

import React, { useState, useEffect } from "react";
import { Text } from "ink";

const UNICODE_FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];
const ASCII_FRAMES = ["|", "/", "-", "\\"];

export interface SpinnerProps {
  label?: string;
  ascii?: boolean;
}

export function Spinner({ label, ascii = false }: SpinnerProps): React.ReactElement {
  const frames = ascii ? ASCII_FRAMES : UNICODE_FRAMES;
  const [frame, setFrame] = useState(0);

  useEffect(() => {
    const interval = setInterval(() => {
      setFrame((prev) => (prev + 1) % frames.length);
    }, 80);
    return () => clearInterval(interval);
  }, [frames.length]);

  return (
    <Text>
      <Text color="cyan">{frames[frame % frames.length]}</Text>
      {label && <Text> {label}</Text>}
    </Text>
  );
}
