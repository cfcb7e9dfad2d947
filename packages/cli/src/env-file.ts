/**
 * KEY=VALUE env files for `start --env-file`.
 */

import { readFileSync } from "node:fs";

/**
 * Parse KEY=VALUE lines, ignoring blank lines and `#` comments.
 * Matching single or double quotes around a value are removed.
 */
export function parseEnvFile(content: string): Map<string, string> {
  const entries = new Map<string, string>();
  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) {
      continue;
    }
    const eq = trimmed.indexOf("=");
    if (eq <= 0) {
      continue;
    }
    const key = trimmed.slice(0, eq).trim().replace(/^export\s+/, "");
    let value = trimmed.slice(eq + 1).trim();
    if (
      value.length >= 2 &&
      ((value.startsWith('"') && value.endsWith('"')) ||
        (value.startsWith("'") && value.endsWith("'")))
    ) {
      value = value.slice(1, -1);
    }
    entries.set(key, value);
  }
  return entries;
}

/**
 * Apply an env file to `env`. Variables already set win over the file.
 * Returns the names that were set.
 */
export function loadEnvFile(
  filePath: string,
  env: NodeJS.ProcessEnv = process.env
): string[] {
  const applied: string[] = [];
  for (const [key, value] of parseEnvFile(readFileSync(filePath, "utf-8"))) {
    if (env[key] === undefined) {
      env[key] = value;
      applied.push(key);
    }
  }
  return applied;
}
