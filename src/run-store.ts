import { randomUUID } from "node:crypto";
import type { Run } from "./types.ts";

export function createRun(prompt: string): Run {
  return {
    runId: randomUUID(),
    prompt,
    status: "pending",
    plan: null,
    executionLog: [],
    createdAt: new Date().toISOString(),
    completedAt: null,
    error: null,
    errorKind: null,
  };
}

/**
 * Process-lifetime run storage. Stores the run objects themselves, so a run
 * being executed is visible with its current progress.
 */
export class RunStore {
  private readonly runs = new Map<string, Run>();

  save(run: Run): void {
    this.runs.set(run.runId, run);
  }

  get(runId: string): Run | null {
    return this.runs.get(runId) ?? null;
  }

  exists(runId: string): boolean {
    return this.runs.has(runId);
  }

  delete(runId: string): boolean {
    return this.runs.delete(runId);
  }

  listAll(): Record<string, Run> {
    return Object.fromEntries(this.runs);
  }

  clear(): void {
    this.runs.clear();
  }

  get size(): number {
    return this.runs.size;
  }
}
