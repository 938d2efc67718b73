import { expect, test } from "vitest";
import { loadConfig } from "../src/config.ts";
import { sanitizeLimit, sanitizeRunStatus, sanitizeText } from "../src/utils/validation.ts";

test("loadConfig falls back to defaults", () => {
  expect(loadConfig({})).toEqual({
    port: 8000,
    host: "0.0.0.0",
    ollamaUrl: "http://localhost:11434",
    ollamaModel: "gpt-oss",
    execution: {
      maxRetries: 2,
      initialRetryDelay: 1,
      backoffMultiplier: 2,
      stepTimeout: 30,
      retryPermanentFaults: true,
    },
    maxParallelRuns: 4,
    rateLimitPerMinute: 200,
    trustProxy: false,
    todoStoreScope: "run",
  });
});

test("loadConfig reads overrides from the environment", () => {
  const config = loadConfig({
    PORT: "9100",
    OLLAMA_URL: " http://ollama:11434 ",
    OLLAMA_MODEL: "llama3",
    MAX_RETRIES: "0",
    INITIAL_RETRY_DELAY_SECONDS: "0.25",
    BACKOFF_MULTIPLIER: "3",
    STEP_TIMEOUT_SECONDS: "5",
    RETRY_PERMANENT_FAULTS: "false",
    MAX_PARALLEL_RUNS: "1",
    TODO_STORE_SCOPE: "Process",
    TRUST_PROXY: "yes",
  });

  expect(config.port).toBe(9100);
  expect(config.ollamaUrl).toBe("http://ollama:11434");
  expect(config.ollamaModel).toBe("llama3");
  expect(config.execution).toEqual({
    maxRetries: 0,
    initialRetryDelay: 0.25,
    backoffMultiplier: 3,
    stepTimeout: 5,
    retryPermanentFaults: false,
  });
  expect(config.maxParallelRuns).toBe(1);
  expect(config.todoStoreScope).toBe("process");
  expect(config.trustProxy).toBe(true);
});

test("loadConfig ignores values it cannot use", () => {
  const config = loadConfig({
    PORT: "-1",
    MAX_RETRIES: "many",
    BACKOFF_MULTIPLIER: "0",
    RETRY_PERMANENT_FAULTS: "maybe",
    TODO_STORE_SCOPE: "global",
  });

  expect(config.port).toBe(8000);
  expect(config.execution.maxRetries).toBe(2);
  expect(config.execution.backoffMultiplier).toBe(2);
  expect(config.execution.retryPermanentFaults).toBe(true);
  expect(config.todoStoreScope).toBe("run");
});

test("sanitizers trim and bound their input", () => {
  expect(sanitizeText("  hello  ")).toBe("hello");
  expect(sanitizeText("   ")).toBeNull();
  expect(sanitizeText("abcdef", 3)).toBeNull();
  expect(sanitizeRunStatus(" failed ")).toBe("failed");
  expect(sanitizeRunStatus("sleeping")).toBeNull();
  expect(sanitizeLimit(undefined)).toBe(20);
  expect(sanitizeLimit("7.9")).toBe(7);
  expect(sanitizeLimit("5000")).toBe(200);
  expect(sanitizeLimit("-3")).toBe(20);
});
