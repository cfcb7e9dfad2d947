/**
 * Registration API.
 * Thin handlers over the session registry; field names follow the shell
 * wrapper's wire format (snake_case).
 */

import type { FastifyInstance } from "fastify";
import {
  SESSION_STATUSES,
  killSession,
  type ProcessTree,
  type RecentDirectories,
  type SessionRegistry,
  type SessionStatus,
} from "@session-board/core";

interface TasksRoutesOptions {
  registry: SessionRegistry;
  tree: ProcessTree;
  recentDirs?: Pick<RecentDirectories, "promote"> | null;
}

interface CreateTaskBody {
  id: string;
  name: string;
  shell_pid?: number | null;
  cwd?: string | null;
}

interface UpdateTaskBody {
  status: SessionStatus;
  exit_code?: number | null;
}

interface TaskParams {
  id: string;
}

const createTaskSchema = {
  body: {
    type: "object",
    required: ["id", "name"],
    properties: {
      id: { type: "string", minLength: 1 },
      name: { type: "string" },
      shell_pid: { type: ["integer", "null"], minimum: 1 },
      cwd: { type: ["string", "null"] },
    },
  },
} as const;

const updateTaskSchema = {
  body: {
    type: "object",
    required: ["status"],
    properties: {
      status: { type: "string", enum: [...SESSION_STATUSES] },
      exit_code: { type: ["integer", "null"] },
    },
  },
} as const;

export async function registerTasksRoutes(
  app: FastifyInstance,
  options: TasksRoutesOptions
): Promise<void> {
  const { registry, tree, recentDirs } = options;

  app.post<{ Body: CreateTaskBody }>(
    "/task",
    { schema: createTaskSchema },
    async (request) => {
      const { id, name, shell_pid, cwd } = request.body;
      const workingDirectory = cwd?.trim() ? cwd : null;
      registry.register({
        id,
        name,
        shellPid: shell_pid ?? null,
        workingDirectory,
      });
      if (workingDirectory) {
        recentDirs?.promote(workingDirectory);
      }
      return { ok: true };
    }
  );

  app.patch<{ Params: TaskParams; Body: UpdateTaskBody }>(
    "/task/:id",
    { schema: updateTaskSchema },
    async (request, reply) => {
      const { status, exit_code } = request.body;
      const result = registry.updateStatus(request.params.id, status, exit_code);
      if (!result.ok) {
        return reply.code(404).send({ ok: false, error: result.error });
      }
      return { ok: true };
    }
  );

  app.get("/tasks", async () => registry.snapshot());

  app.get<{ Params: TaskParams }>("/task/:id", async (request, reply) => {
    const session = registry.get(request.params.id);
    if (!session) {
      return reply.code(404).send({ ok: false, error: "not found" });
    }
    return session;
  });

  app.post<{ Params: TaskParams }>("/task/:id/kill", async (request, reply) => {
    const result = await killSession(registry, tree, request.params.id);
    if (!result.ok) {
      const code = result.error === "not found" ? 404 : 409;
      return reply.code(code).send({ ok: false, error: result.error });
    }
    const failed = result.reports.flatMap((report) => report.failed);
    if (failed.length > 0) {
      request.log.warn({ id: request.params.id, failed }, "some processes could not be signalled");
    }
    return { ok: true, session: result.session };
  });
}
