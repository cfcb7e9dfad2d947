import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadEnvFile, parseEnvFile } from "./env-file.js";

describe("parseEnvFile", () => {
  it("reads assignments and skips comments and blank lines", () => {
    const entries = parseEnvFile(
      ["# board settings", "", "SB_LISTEN_PORT=9090", "  SB_ASCII = 1  ", "not an assignment"].join("\n")
    );
    expect([...entries]).toEqual([
      ["SB_LISTEN_PORT", "9090"],
      ["SB_ASCII", "1"],
    ]);
  });

  it("strips matching quotes and an export prefix", () => {
    const entries = parseEnvFile(
      'export SB_DB_PATH="/tmp/history.sqlite"\r\nSB_AGENT_NAMES=\'claude,node\'\nSB_DEBUG="1\n'
    );
    expect(entries.get("SB_DB_PATH")).toBe("/tmp/history.sqlite");
    expect(entries.get("SB_AGENT_NAMES")).toBe("claude,node");
    expect(entries.get("SB_DEBUG")).toBe('"1');
  });

  it("ignores lines starting with =", () => {
    expect(parseEnvFile("=value").size).toBe(0);
  });
});

describe("loadEnvFile", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "sb-env-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("keeps variables that are already set", () => {
    const file = join(dir, "board.env");
    writeFileSync(file, "SB_LISTEN_PORT=9090\nSB_ASCII=1\n");
    const env: NodeJS.ProcessEnv = { SB_LISTEN_PORT: "8080" };

    const applied = loadEnvFile(file, env);

    expect(applied).toEqual(["SB_ASCII"]);
    expect(env).toEqual({ SB_LISTEN_PORT: "8080", SB_ASCII: "1" });
  });

  it("throws when the file is missing", () => {
    expect(() => loadEnvFile(join(dir, "missing.env"), {})).toThrow(/ENOENT/);
  });
});
