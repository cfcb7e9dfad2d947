/**
 * Board application root.
 */

import React from "react";
import { BoardScreen } from "./screens/index.js";
import { ASCII_GLYPHS, UNICODE_GLYPHS } from "./board-model.js";
import type { BoardSource } from "./source.js";

export interface AppProps {
  source: BoardSource;
  ascii: boolean;
  visibilityWindowMs: number;
}

export function App({ source, ascii, visibilityWindowMs }: AppProps): React.ReactElement {
  return (
    <BoardScreen
      source={source}
      glyphs={ascii ? ASCII_GLYPHS : UNICODE_GLYPHS}
      ascii={ascii}
      visibilityWindowMs={visibilityWindowMs}
    />
  );
}
