export type RunStatus = "pending" | "running" | "completed" | "failed";
export type StepStatus = "pending" | "running" | "completed" | "failed";
export type RunErrorKind = "step_failed" | "planning_failed" | "execution_fault" | "canceled";

export const RUN_STATUSES: readonly RunStatus[] = ["pending", "running", "completed", "failed"];

export interface PlanStep {
  stepNumber: number;
  tool: string;
  input: Record<string, unknown>;
  reasoning: string;
}

export interface Plan {
  planId: string;
  steps: PlanStep[];
}

export interface ExecutionLogEntry {
  stepNumber: number;
  tool: string;
  input: Record<string, unknown>;
  output: unknown;
  status: StepStatus;
  error: string | null;
  attempt: number;
  startedAt: string;
  completedAt: string | null;
}

export interface Run {
  runId: string;
  prompt: string;
  status: RunStatus;
  plan: Plan | null;
  executionLog: ExecutionLogEntry[];
  createdAt: string;
  completedAt: string | null;
  error: string | null;
  errorKind: RunErrorKind | null;
}

export interface ToolResult {
  success: boolean;
  output?: unknown;
  error?: string;
}

export type SchemaFieldType = "string" | "number" | "integer" | "boolean";

export interface SchemaField {
  type: SchemaFieldType;
  description?: string;
  enum?: string[];
}

export interface ToolInputSchema {
  type: "object";
  properties: Record<string, SchemaField>;
  required?: string[];
}

export interface ToolInfo {
  name: string;
  description: string;
  input_schema: ToolInputSchema;
}

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}
