import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
  type Tool as McpTool,
} from "@modelcontextprotocol/sdk/types.js";
import { RunNotResumableError } from "../errors.ts";
import type { RuntimeQueue } from "../runtime/queue.ts";
import { serializeRun } from "../serialize.ts";
import { sanitizeLimit, sanitizeRunStatus, sanitizeText } from "../utils/validation.ts";

const RUN_ID_SCHEMA: McpTool["inputSchema"] = {
  type: "object",
  properties: {
    run_id: { type: "string" },
  },
  required: ["run_id"],
  additionalProperties: false,
};

const TOOL_DEFS: McpTool[] = [
  {
    name: "agent_run_create",
    description: "Plan and execute a prompt in the background. Returns a run_id immediately.",
    inputSchema: {
      type: "object",
      properties: {
        prompt: { type: "string" },
      },
      required: ["prompt"],
      additionalProperties: false,
    },
  },
  {
    name: "agent_run_status",
    description: "Get status and step progress for a run.",
    inputSchema: RUN_ID_SCHEMA,
  },
  {
    name: "agent_run_get",
    description: "Get the full run including plan and execution log.",
    inputSchema: RUN_ID_SCHEMA,
  },
  {
    name: "agent_run_resume",
    description: "Resume a failed run from the step after the last completed one.",
    inputSchema: RUN_ID_SCHEMA,
  },
  {
    name: "agent_run_cancel",
    description: "Cancel a pending or running run.",
    inputSchema: RUN_ID_SCHEMA,
  },
  {
    name: "agent_run_list",
    description: "List recent runs, newest first.",
    inputSchema: {
      type: "object",
      properties: {
        status: { type: "string", enum: ["pending", "running", "completed", "failed"] },
        limit: { type: "number" },
      },
      additionalProperties: false,
    },
  },
  {
    name: "agent_tools_list",
    description: "List the tools plans can use, with their input schemas.",
    inputSchema: {
      type: "object",
      properties: {},
      additionalProperties: false,
    },
  },
  {
    name: "agent_health",
    description: "Worker and queue health.",
    inputSchema: {
      type: "object",
      properties: {},
      additionalProperties: false,
    },
  },
];

function asToolContent(payload: unknown): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(payload, null, 2) }],
  };
}

function toErrorContent(message: string): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify({ error: message }) }],
    isError: true,
  };
}

export function listToolNames(): string[] {
  return TOOL_DEFS.map((tool) => tool.name);
}

export function handleToolCall(runtime: RuntimeQueue, name: string, args: Record<string, unknown>): CallToolResult {
  const runId = typeof args["run_id"] === "string" ? args["run_id"].trim() : "";

  switch (name) {
    case "agent_run_create": {
      const prompt = sanitizeText(typeof args["prompt"] === "string" ? args["prompt"] : undefined);
      if (!prompt) return toErrorContent("prompt is required");
      const run = runtime.createRun(prompt);
      return asToolContent({ run_id: run.runId, status: run.status, created_at: run.createdAt });
    }

    case "agent_run_status": {
      if (!runId) return toErrorContent("run_id is required");
      const run = runtime.getRun(runId);
      if (!run) return toErrorContent(`run not found: ${runId}`);
      const stepsTotal = run.plan?.steps.length ?? 0;
      const stepsDone = run.executionLog.filter((entry) => entry.status === "completed").length;
      return asToolContent({
        run_id: runId,
        status: run.status,
        progress: { steps_total: stepsTotal, steps_done: stepsDone },
        error: run.error,
        error_kind: run.errorKind,
        completed_at: run.completedAt,
      });
    }

    case "agent_run_get": {
      if (!runId) return toErrorContent("run_id is required");
      const run = runtime.getRun(runId);
      if (!run) return toErrorContent(`run not found: ${runId}`);
      return asToolContent(serializeRun(run));
    }

    case "agent_run_resume": {
      if (!runId) return toErrorContent("run_id is required");
      try {
        const run = runtime.resumeRun(runId);
        if (!run) return toErrorContent(`run not found: ${runId}`);
        return asToolContent({ run_id: runId, status: run.status, resumed: true });
      } catch (error) {
        if (error instanceof RunNotResumableError) return toErrorContent(error.message);
        throw error;
      }
    }

    case "agent_run_cancel": {
      if (!runId) return toErrorContent("run_id is required");
      const run = runtime.cancelRun(runId);
      if (!run) return toErrorContent(`run not found: ${runId}`);
      return asToolContent({ run_id: runId, status: run.status });
    }

    case "agent_run_list": {
      const statusArg = typeof args["status"] === "string" ? args["status"] : undefined;
      const status = sanitizeRunStatus(statusArg);
      if (statusArg && !status) return toErrorContent("status must be one of pending|running|completed|failed");
      const limit = typeof args["limit"] === "number" ? args["limit"] : undefined;
      const runs = runtime.listRuns(status ?? undefined, sanitizeLimit(limit));
      return asToolContent({
        runs: runs.map((run) => ({
          run_id: run.runId,
          prompt: run.prompt,
          status: run.status,
          created_at: run.createdAt,
          completed_at: run.completedAt,
        })),
      });
    }

    case "agent_tools_list":
      return asToolContent(runtime.listTools());

    case "agent_health": {
      const health = runtime.health();
      return asToolContent({
        worker_alive: health.workerAlive,
        active_runs: health.activeRuns,
        pending_runs: health.pendingRuns,
        stored_runs: health.storedRuns,
        tools: health.tools,
      });
    }

    default:
      return toErrorContent(`unknown tool: ${name || "(missing name)"}`);
  }
}

export function registerToolHandlers(server: Server, runtime: RuntimeQueue): void {
  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: TOOL_DEFS,
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const name = request.params.name;
    const args = request.params.arguments ?? {};

    try {
      return handleToolCall(runtime, name, args);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return toErrorContent(message);
    }
  });
}
