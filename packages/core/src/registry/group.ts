import { basename, normalize } from "node:path";
import { DEFAULT_GROUP } from "../types/index.js";

/**
 * Display bucket for a session: the base name of its working directory,
 * or the default group when there is no usable directory.
 */
export function deriveGroup(workingDirectory: string | null | undefined): string {
  const trimmed = workingDirectory?.trim();
  if (!trimmed || trimmed === "/") {
    return DEFAULT_GROUP;
  }
  return basename(normalize(trimmed)) || DEFAULT_GROUP;
}
