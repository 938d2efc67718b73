import { z } from "zod";
import type { ExecutionLogEntry, Plan, Run } from "./types.ts";

const statusSchema = z.enum(["pending", "running", "completed", "failed"]);

const planSchema = z.object({
  plan_id: z.string(),
  steps: z.array(
    z.object({
      step_number: z.number().int(),
      tool: z.string(),
      input: z.record(z.unknown()),
      reasoning: z.string(),
    })
  ),
});

const logEntrySchema = z.object({
  step_number: z.number().int(),
  tool: z.string(),
  input: z.record(z.unknown()),
  output: z.unknown(),
  status: statusSchema,
  error: z.string().nullable(),
  attempt: z.number().int().positive(),
  started_at: z.string(),
  completed_at: z.string().nullable(),
});

export const runWireSchema = z.object({
  run_id: z.string(),
  prompt: z.string(),
  status: statusSchema,
  plan: planSchema.nullable(),
  execution_log: z.array(logEntrySchema),
  created_at: z.string(),
  completed_at: z.string().nullable(),
  error: z.string().nullable(),
  error_kind: z.enum(["step_failed", "planning_failed", "execution_fault", "canceled"]).nullable(),
});

export type RunWire = z.infer<typeof runWireSchema>;

function serializePlan(plan: Plan): NonNullable<RunWire["plan"]> {
  return {
    plan_id: plan.planId,
    steps: plan.steps.map((step) => ({
      step_number: step.stepNumber,
      tool: step.tool,
      input: step.input,
      reasoning: step.reasoning,
    })),
  };
}

function serializeEntry(entry: ExecutionLogEntry): RunWire["execution_log"][number] {
  return {
    step_number: entry.stepNumber,
    tool: entry.tool,
    input: entry.input,
    output: entry.output ?? null,
    status: entry.status,
    error: entry.error,
    attempt: entry.attempt,
    started_at: entry.startedAt,
    completed_at: entry.completedAt,
  };
}

/** snake_case wire shape used by the HTTP and MCP surfaces. */
export function serializeRun(run: Run): RunWire {
  return {
    run_id: run.runId,
    prompt: run.prompt,
    status: run.status,
    plan: run.plan ? serializePlan(run.plan) : null,
    execution_log: run.executionLog.map(serializeEntry),
    created_at: run.createdAt,
    completed_at: run.completedAt,
    error: run.error,
    error_kind: run.errorKind,
  };
}

/** Validates a wire-format run (for example one read back from JSON) and rebuilds the in-memory shape. */
export function deserializeRun(data: unknown): Run {
  const wire = runWireSchema.parse(data);
  return {
    runId: wire.run_id,
    prompt: wire.prompt,
    status: wire.status,
    plan: wire.plan
      ? {
          planId: wire.plan.plan_id,
          steps: wire.plan.steps.map((step) => ({
            stepNumber: step.step_number,
            tool: step.tool,
            input: step.input,
            reasoning: step.reasoning,
          })),
        }
      : null,
    executionLog: wire.execution_log.map((entry) => ({
      stepNumber: entry.step_number,
      tool: entry.tool,
      input: entry.input,
      output: entry.output ?? null,
      status: entry.status,
      error: entry.error,
      attempt: entry.attempt,
      startedAt: entry.started_at,
      completedAt: entry.completed_at,
    })),
    createdAt: wire.created_at,
    completedAt: wire.completed_at,
    error: wire.error,
    errorKind: wire.error_kind,
  };
}
