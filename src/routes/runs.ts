import { Hono } from "hono";
import { RunNotResumableError } from "../errors.ts";
import type { RuntimeQueue } from "../runtime/queue.ts";
import { serializeRun } from "../serialize.ts";
import { createRunBodySchema, formatZodError, sanitizeLimit, sanitizeRunStatus } from "../utils/validation.ts";

function notFound(runId: string) {
  return { error: { code: "RUN_NOT_FOUND", message: `Run '${runId}' not found` } };
}

export function runsRoute(runtime: RuntimeQueue): Hono {
  const route = new Hono();

  route.post("/", async (c) => {
    const body: unknown = await c.req.json().catch(() => null);
    const parsed = createRunBodySchema.safeParse(body);
    if (!parsed.success) {
      return c.json(
        { error: { code: "INVALID_BODY", message: `Failed to create run: ${formatZodError(parsed.error)}` } },
        400
      );
    }

    try {
      const run = runtime.createRun(parsed.data.prompt);
      return c.json({ run_id: run.runId, status: "pending" }, 201);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return c.json({ error: { code: "RUN_CREATE_FAILED", message: `Failed to create run: ${message}` } }, 400);
    }
  });

  route.get("/", (c) => {
    const statusParam = c.req.query("status");
    const status = sanitizeRunStatus(statusParam);
    if (statusParam && !status) {
      return c.json(
        { error: { code: "INVALID_PARAM", message: "status must be one of pending|running|completed|failed" } },
        400
      );
    }

    const runs = runtime.listRuns(status ?? undefined, sanitizeLimit(c.req.query("limit")));
    return c.json({
      runs: runs.map((run) => ({
        run_id: run.runId,
        prompt: run.prompt,
        status: run.status,
        created_at: run.createdAt,
        completed_at: run.completedAt,
      })),
    });
  });

  route.get("/:id", (c) => {
    const runId = c.req.param("id");
    const run = runtime.getRun(runId);
    if (!run) return c.json(notFound(runId), 404);
    return c.json(serializeRun(run));
  });

  route.post("/:id/resume", (c) => {
    const runId = c.req.param("id");
    try {
      const run = runtime.resumeRun(runId);
      if (!run) return c.json(notFound(runId), 404);
      return c.json({ run_id: run.runId, status: run.status }, 202);
    } catch (error) {
      if (error instanceof RunNotResumableError) {
        return c.json({ error: { code: "RUN_NOT_RESUMABLE", message: error.message } }, 409);
      }
      throw error;
    }
  });

  route.post("/:id/cancel", (c) => {
    const runId = c.req.param("id");
    const run = runtime.cancelRun(runId);
    if (!run) return c.json(notFound(runId), 404);
    return c.json({ run_id: run.runId, status: run.status });
  });

  route.delete("/:id", (c) => {
    const runId = c.req.param("id");
    if (!runtime.deleteRun(runId)) return c.json(notFound(runId), 404);
    return c.json({ run_id: runId, deleted: true });
  });

  return route;
}
