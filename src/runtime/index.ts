import type { AppConfig } from "../config.ts";
import { OllamaClient, type ChatClient } from "../ollama-client.ts";
import { RunStore } from "../run-store.ts";
import { createDefaultRegistry } from "../tools/index.ts";
import type { ToolRegistry } from "../tools/base.ts";
import { Orchestrator, type Sleep } from "./executor.ts";
import { LlmPlanner, type Planner } from "./planner.ts";
import { RuntimeQueue } from "./queue.ts";

export { Orchestrator, DEFAULT_EXECUTION_CONFIG, backoffDelay } from "./executor.ts";
export type { ExecutionConfig, Sleep } from "./executor.ts";
export { LlmPlanner, extractJson, loadPlannerExamples } from "./planner.ts";
export type { Planner } from "./planner.ts";
export { RuntimeQueue } from "./queue.ts";

export interface RuntimeOverrides {
  chatClient?: ChatClient;
  planner?: Planner;
  registry?: ToolRegistry;
  store?: RunStore;
  sleep?: Sleep;
}

export interface Runtime {
  registry: ToolRegistry;
  store: RunStore;
  orchestrator: Orchestrator;
  queue: RuntimeQueue;
}

/** Wires registry, planner, orchestrator, store and queue from config. */
export function buildRuntime(config: AppConfig, overrides: RuntimeOverrides = {}): Runtime {
  const registry = overrides.registry ?? createDefaultRegistry({ todoScope: config.todoStoreScope });
  const store = overrides.store ?? new RunStore();
  const planner =
    overrides.planner ??
    new LlmPlanner(registry, overrides.chatClient ?? new OllamaClient(config.ollamaUrl), {
      model: config.ollamaModel,
    });
  const orchestrator = new Orchestrator(registry, config.execution, { sleep: overrides.sleep });
  const queue = new RuntimeQueue({ maxParallelRuns: config.maxParallelRuns }, store, planner, orchestrator, registry);
  return { registry, store, orchestrator, queue };
}
