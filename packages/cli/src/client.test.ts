import { describe, it, expect, vi, afterEach } from "vitest";
import { DaemonClient, DaemonRequestError } from "./client.js";

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

describe("DaemonClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("builds the base URL from a port", () => {
    expect(DaemonClient.forPort(9090).baseUrl).toBe("http://127.0.0.1:9090");
  });

  it("returns null for an unknown session", async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse(404, { ok: false, error: "not found" }));
    vi.stubGlobal("fetch", fetchMock);

    const session = await new DaemonClient("http://daemon.test").getSession("a b");

    expect(session).toBeNull();
    expect(fetchMock.mock.calls[0]?.[0]).toBe("http://daemon.test/task/a%20b");
  });

  it("passes a 409 kill answer through", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn().mockResolvedValue(jsonResponse(409, { ok: false, error: "not active" }))
    );

    const result = await new DaemonClient("http://daemon.test").killSession("s-1");

    expect(result).toEqual({ ok: false, error: "not active" });
  });

  it("encodes history filters as query parameters", async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse(200, []));
    vi.stubGlobal("fetch", fetchMock);

    await new DaemonClient("http://daemon.test").history({ limit: 5, status: "KILLED", group: "web" });

    expect(fetchMock.mock.calls[0]?.[0]).toBe(
      "http://daemon.test/api/history?limit=5&status=KILLED&group=web"
    );
  });

  it("throws on server errors", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(jsonResponse(503, { error: "no db" })));

    const attempt = new DaemonClient("http://daemon.test").history();

    await expect(attempt).rejects.toBeInstanceOf(DaemonRequestError);
    await expect(attempt).rejects.toThrow("HTTP 503");
  });

  it("reports a refused connection as a stopped daemon", async () => {
    const refused = Object.assign(new TypeError("fetch failed"), {
      cause: { code: "ECONNREFUSED" },
    });
    vi.stubGlobal("fetch", vi.fn().mockRejectedValue(refused));

    const attempt = new DaemonClient("http://daemon.test").health();

    await expect(attempt).rejects.toThrow("Daemon not running");
  });
});
