/**
 * HTTP client for the daemon's API.
 */

import type { HistoryEntry, Session, TerminalStatus } from "@session-board/core";

export interface HealthResponse {
  status: string;
  pid: number;
  uptime: number;
  startedAt: string;
  totalSessions: number;
  trackedSessions: number;
  /** Rows in the history archive, null when the daemon runs without one */
  archivedSessions: number | null;
}

export type KillResponse =
  | { ok: true; session: Session }
  | { ok: false; error: string };

export class DaemonRequestError extends Error {
  constructor(
    message: string,
    readonly statusCode: number | null
  ) {
    super(message);
    this.name = "DaemonRequestError";
  }
}

export interface HistoryFilter {
  limit?: number;
  status?: TerminalStatus;
  group?: string;
}

export class DaemonClient {
  constructor(
    readonly baseUrl: string,
    private readonly timeoutMs = 5000
  ) {}

  static forPort(port: number): DaemonClient {
    return new DaemonClient(`http://127.0.0.1:${port}`);
  }

  private async request<T>(path: string, init: RequestInit = {}): Promise<T> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${path}`, {
        ...init,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const err = error as { cause?: { code?: string }; name?: string };
      if (err.cause?.code === "ECONNREFUSED") {
        throw new DaemonRequestError("Daemon not running", null);
      }
      if (err.name === "TimeoutError") {
        throw new DaemonRequestError("Connection timeout", null);
      }
      throw new DaemonRequestError("Connection failed", null);
    }

    if (!response.ok && response.status !== 404 && response.status !== 409) {
      throw new DaemonRequestError(`HTTP ${response.status}`, response.status);
    }
    return (await response.json()) as T;
  }

  health(): Promise<HealthResponse> {
    return this.request<HealthResponse>("/api/health");
  }

  listSessions(): Promise<Session[]> {
    return this.request<Session[]>("/tasks");
  }

  async getSession(id: string): Promise<Session | null> {
    const result = await this.request<Session | { ok: false }>(
      `/task/${encodeURIComponent(id)}`
    );
    return "ok" in result ? null : result;
  }

  killSession(id: string): Promise<KillResponse> {
    return this.request<KillResponse>(`/task/${encodeURIComponent(id)}/kill`, {
      method: "POST",
    });
  }

  history(filter: HistoryFilter = {}): Promise<HistoryEntry[]> {
    const params = new URLSearchParams();
    if (filter.limit !== undefined) params.set("limit", String(filter.limit));
    if (filter.status) params.set("status", filter.status);
    if (filter.group) params.set("group", filter.group);
    const query = params.toString();
    return this.request<HistoryEntry[]>(`/api/history${query ? `?${query}` : ""}`);
  }

  recentDirectories(): Promise<string[]> {
    return this.request<string[]>("/api/recent");
  }
}
