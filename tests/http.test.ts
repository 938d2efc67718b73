import { expect, test } from "vitest";
import { z } from "zod";
import { buildApp } from "../src/app.ts";
import { loadConfig } from "../src/config.ts";
import { PlanningError } from "../src/errors.ts";
import { buildRuntime, DEFAULT_EXECUTION_CONFIG, type Planner } from "../src/runtime/index.ts";
import type { Plan } from "../src/types.ts";

class PromptTablePlanner implements Planner {
  async createPlan(prompt: string): Promise<Plan> {
    if (prompt === "What is (41*7)+13?") {
      return {
        planId: "plan-calc",
        steps: [{ stepNumber: 1, tool: "Calculator", input: { expression: "(41*7)+13" }, reasoning: "compute" }],
      };
    }
    if (prompt === "Divide by zero") {
      return {
        planId: "plan-divide",
        steps: [{ stepNumber: 1, tool: "Calculator", input: { expression: "10/0" }, reasoning: "divide" }],
      };
    }
    throw new PlanningError("no plan");
  }
}

function setup(rateLimitPerMinute?: number) {
  const config = { ...loadConfig({}), execution: { ...DEFAULT_EXECUTION_CONFIG, maxRetries: 0 } };
  const { queue } = buildRuntime(config, { planner: new PromptTablePlanner() });
  const app = buildApp(queue, { rateLimitPerMinute, accessLog: false });
  return { app, queue };
}

const createdSchema = z.object({ run_id: z.string(), status: z.string() });

async function readJson(res: Response | Promise<Response>): Promise<unknown> {
  return (await res).json();
}

async function createRun(app: ReturnType<typeof setup>["app"], prompt: string): Promise<string> {
  const res = await app.request("/runs", postJson({ prompt }));
  expect(res.status).toBe(201);
  return createdSchema.parse(await res.json()).run_id;
}

function postJson(body: unknown): RequestInit {
  return {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  };
}

test("GET /health reports the service and its tools", async () => {
  const { app } = setup();

  const res = await app.request("/health");

  expect(res.status).toBe(200);
  expect(await res.json()).toEqual({
    status: "healthy",
    service: "agent-runtime",
    available_tools: "Calculator, TodoStore",
  });
  expect(res.headers.get("X-Content-Type-Options")).toBe("nosniff");
});

test("GET /tools lists tool schemas keyed by name", async () => {
  const { app } = setup();

  const res = await app.request("/tools");
  const body = z.record(z.unknown()).parse(await res.json());

  expect(res.status).toBe(200);
  expect(Object.keys(body)).toEqual(["Calculator", "TodoStore"]);
  expect(body["Calculator"]).toMatchObject({ name: "Calculator", input_schema: { required: ["expression"] } });
});

test("POST /runs accepts a prompt and GET /runs/:id returns the finished run", async () => {
  const { app, queue } = setup();

  const created = await app.request("/runs", postJson({ prompt: "  What is (41*7)+13?  " }));
  expect(created.status).toBe(201);
  const { run_id: runId, status } = createdSchema.parse(await created.json());
  expect(status).toBe("pending");

  await queue.idle();

  const res = await app.request(`/runs/${runId}`);
  expect(res.status).toBe(200);
  const run = z.record(z.unknown()).parse(await res.json());
  expect(run).toMatchObject({
    run_id: runId,
    prompt: "What is (41*7)+13?",
    status: "completed",
    plan: { plan_id: "plan-calc", steps: [{ step_number: 1, tool: "Calculator" }] },
    execution_log: [{ step_number: 1, tool: "Calculator", status: "completed", output: 300, attempt: 1, error: null }],
    error: null,
    error_kind: null,
  });
  expect(typeof run["completed_at"]).toBe("string");
});

test("POST /runs rejects a blank prompt", async () => {
  const { app } = setup();

  const res = await app.request("/runs", postJson({ prompt: "   " }));

  expect(res.status).toBe(400);
  expect(await res.json()).toEqual({
    error: { code: "INVALID_BODY", message: "Failed to create run: prompt: prompt must not be empty" },
  });
});

test("POST /runs rejects a body that is not JSON", async () => {
  const { app } = setup();

  const res = await app.request("/runs", {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: "{not json",
  });

  expect(res.status).toBe(400);
  expect(await res.json()).toMatchObject({ error: { code: "INVALID_BODY" } });
});

test("GET /runs/:id returns 404 for unknown runs", async () => {
  const { app } = setup();

  const res = await app.request("/runs/does-not-exist");

  expect(res.status).toBe(404);
  expect(await res.json()).toEqual({
    error: { code: "RUN_NOT_FOUND", message: "Run 'does-not-exist' not found" },
  });
});

test("a failed run exposes its error and cannot be resumed once completed", async () => {
  const { app, queue } = setup();

  const failedId = await createRun(app, "Divide by zero");
  const doneId = await createRun(app, "What is (41*7)+13?");
  await queue.idle();

  expect(await readJson(app.request(`/runs/${failedId}`))).toMatchObject({
    status: "failed",
    error: "Step 1 failed: Division by zero",
    error_kind: "step_failed",
    execution_log: [{ step_number: 1, status: "failed", error: "Division by zero" }],
  });

  const resumeDone = await app.request(`/runs/${doneId}/resume`, { method: "POST" });
  expect(resumeDone.status).toBe(409);
  expect(await resumeDone.json()).toEqual({ error: { code: "RUN_NOT_RESUMABLE", message: "Run cannot be resumed" } });

  const resumeFailed = await app.request(`/runs/${failedId}/resume`, { method: "POST" });
  expect(resumeFailed.status).toBe(202);
  expect(await resumeFailed.json()).toMatchObject({ run_id: failedId });
  await queue.idle();

  const resumeMissing = await app.request("/runs/missing/resume", { method: "POST" });
  expect(resumeMissing.status).toBe(404);
});

test("planning failures are visible on the run", async () => {
  const { app, queue } = setup();

  const runId = await createRun(app, "Something unplannable");
  await queue.idle();

  expect(await readJson(app.request(`/runs/${runId}`))).toMatchObject({
    status: "failed",
    error: "Planning failed: no plan",
    error_kind: "planning_failed",
    plan: null,
  });
});

test("GET /runs lists newest first and validates the status filter", async () => {
  const { app, queue } = setup();

  const firstId = await createRun(app, "What is (41*7)+13?");
  const secondId = await createRun(app, "Divide by zero");
  await queue.idle();

  expect(await readJson(app.request("/runs"))).toMatchObject({
    runs: [
      { run_id: secondId, status: "failed" },
      { run_id: firstId, status: "completed", prompt: "What is (41*7)+13?" },
    ],
  });
  expect(await readJson(app.request("/runs?status=failed"))).toEqual({
    runs: [expect.objectContaining({ run_id: secondId })],
  });
  expect(await readJson(app.request("/runs?limit=1"))).toEqual({
    runs: [expect.objectContaining({ run_id: secondId })],
  });

  const invalid = await app.request("/runs?status=sleeping");
  expect(invalid.status).toBe(400);
  expect(await invalid.json()).toMatchObject({ error: { code: "INVALID_PARAM" } });
});

test("DELETE /runs/:id removes the run", async () => {
  const { app, queue } = setup();

  const runId = await createRun(app, "What is (41*7)+13?");
  await queue.idle();

  const res = await app.request(`/runs/${runId}`, { method: "DELETE" });
  expect(res.status).toBe(200);
  expect(await res.json()).toEqual({ run_id: runId, deleted: true });

  expect((await app.request(`/runs/${runId}`)).status).toBe(404);
  expect((await app.request(`/runs/${runId}`, { method: "DELETE" })).status).toBe(404);
});

test("POST /runs/:id/cancel returns the run's status", async () => {
  const { app, queue } = setup();

  const runId = await createRun(app, "What is (41*7)+13?");
  await queue.idle();

  const res = await app.request(`/runs/${runId}/cancel`, { method: "POST" });
  expect(res.status).toBe(200);
  expect(await res.json()).toEqual({ run_id: runId, status: "completed" });
  expect((await app.request("/runs/missing/cancel", { method: "POST" })).status).toBe(404);
});

test("mutating requests are rate limited", async () => {
  const { app, queue } = setup(2);

  expect((await app.request("/runs", postJson({ prompt: "What is (41*7)+13?" }))).status).toBe(201);
  expect((await app.request("/runs", postJson({ prompt: "What is (41*7)+13?" }))).status).toBe(201);
  const limited = await app.request("/runs", postJson({ prompt: "What is (41*7)+13?" }));
  expect(limited.status).toBe(429);
  expect(await limited.json()).toEqual({ error: { code: "RATE_LIMITED", message: "Too many requests" } });
  expect((await app.request("/health")).status).toBe(200);
  await queue.idle();
});

test("unknown routes return a JSON 404", async () => {
  const { app } = setup();

  const res = await app.request("/nope");

  expect(res.status).toBe(404);
  expect(await res.json()).toEqual({ error: { code: "NOT_FOUND", message: "No route for GET /nope" } });
});
