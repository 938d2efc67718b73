import type { ExecutionConfig } from "./runtime/executor.ts";
import type { TodoStoreScope } from "./tools/todo-store.ts";

export interface AppConfig {
  port: number;
  host: string;
  ollamaUrl: string;
  ollamaModel: string;
  execution: ExecutionConfig;
  maxParallelRuns: number;
  rateLimitPerMinute: number;
  trustProxy: boolean;
  todoStoreScope: TodoStoreScope;
}

function parsePositiveInt(raw: string | undefined, fallback: number): number {
  const n = Number(raw);
  if (!raw || !Number.isFinite(n) || n <= 0) return fallback;
  return Math.floor(n);
}

function parseNonNegativeInt(raw: string | undefined, fallback: number): number {
  const n = Number(raw);
  if (!raw || !Number.isFinite(n) || n < 0) return fallback;
  return Math.floor(n);
}

function parsePositiveFloat(raw: string | undefined, fallback: number): number {
  const n = Number(raw);
  if (!raw || !Number.isFinite(n) || n <= 0) return fallback;
  return n;
}

function parseNonNegativeFloat(raw: string | undefined, fallback: number): number {
  const n = Number(raw);
  if (!raw || !Number.isFinite(n) || n < 0) return fallback;
  return n;
}

function parseBoolean(raw: string | undefined, fallback: boolean): boolean {
  if (!raw) return fallback;
  const normalized = raw.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return fallback;
}

function parseTodoScope(raw: string | undefined): TodoStoreScope {
  return raw?.trim().toLowerCase() === "process" ? "process" : "run";
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: parsePositiveInt(env["PORT"], 8000),
    host: env["HOST"]?.trim() || "0.0.0.0",
    ollamaUrl: env["OLLAMA_URL"]?.trim() || "http://localhost:11434",
    ollamaModel: env["OLLAMA_MODEL"]?.trim() || "gpt-oss",
    execution: {
      maxRetries: parseNonNegativeInt(env["MAX_RETRIES"], 2),
      initialRetryDelay: parseNonNegativeFloat(env["INITIAL_RETRY_DELAY_SECONDS"], 1.0),
      backoffMultiplier: parsePositiveFloat(env["BACKOFF_MULTIPLIER"], 2.0),
      stepTimeout: parsePositiveFloat(env["STEP_TIMEOUT_SECONDS"], 30.0),
      retryPermanentFaults: parseBoolean(env["RETRY_PERMANENT_FAULTS"], true),
    },
    maxParallelRuns: parsePositiveInt(env["MAX_PARALLEL_RUNS"], 4),
    rateLimitPerMinute: parsePositiveInt(env["RATE_LIMIT_MAX"], 200),
    trustProxy: parseBoolean(env["TRUST_PROXY"], false),
    todoStoreScope: parseTodoScope(env["TODO_STORE_SCOPE"]),
  };
}
