import { errorMessage, RunCanceledError, RunNotResumableError } from "../errors.ts";
import { createRun, type RunStore } from "../run-store.ts";
import type { ToolRegistry } from "../tools/base.ts";
import type { Plan, Run, RunErrorKind, RunStatus, ToolInfo } from "../types.ts";
import type { Orchestrator } from "./executor.ts";
import type { Planner } from "./planner.ts";

type JobKind = "execute" | "resume";

interface Job {
  kind: JobKind;
  runId: string;
  controller: AbortController;
}

export interface RuntimeHealth {
  workerAlive: boolean;
  activeRuns: number;
  pendingRuns: number;
  storedRuns: number;
  tools: string[];
}

/**
 * Background dispatcher: plans and executes runs off the request path with at
 * most `maxParallelRuns` in flight. Steps inside one run stay sequential.
 */
export class RuntimeQueue {
  private readonly pending: Job[] = [];
  private readonly active = new Map<string, Job>();
  private idleWaiters: Array<() => void> = [];
  private stopped = false;

  constructor(
    private readonly config: { maxParallelRuns: number },
    private readonly store: RunStore,
    private readonly planner: Planner,
    private readonly orchestrator: Orchestrator,
    private readonly registry: ToolRegistry
  ) {}

  createRun(prompt: string): Run {
    if (this.stopped) {
      throw new Error("Runtime queue is stopped");
    }
    const run = createRun(prompt);
    this.store.save(run);
    console.log(`[queue] Run ${run.runId} created`);
    this.enqueue("execute", run.runId);
    return run;
  }

  /**
   * Schedules a resume of a failed run. Returns null for an unknown id and
   * throws RunNotResumableError when the run is busy or not safely resumable.
   */
  resumeRun(runId: string): Run | null {
    const run = this.store.get(runId);
    if (!run) return null;
    if (this.isScheduled(runId)) {
      throw new RunNotResumableError("Run is already scheduled");
    }
    if (!this.orchestrator.canRetryRun(run)) {
      throw new RunNotResumableError();
    }
    if (!run.plan) {
      throw new RunNotResumableError("Run has no plan to resume");
    }
    this.enqueue("resume", runId);
    return run;
  }

  cancelRun(runId: string): Run | null {
    const run = this.store.get(runId);
    if (!run) return null;

    const activeJob = this.active.get(runId);
    if (activeJob) {
      activeJob.controller.abort();
      console.warn(`[queue] Run ${runId} cancel requested`);
      return run;
    }

    const idx = this.pending.findIndex((job) => job.runId === runId);
    if (idx >= 0) {
      const [job] = this.pending.splice(idx, 1);
      if (job?.kind === "execute") {
        this.finishRun(run, new RunCanceledError().message, "canceled");
      }
      console.warn(`[queue] Run ${runId} canceled before start`);
      this.notifyIdle();
    }
    return run;
  }

  getRun(runId: string): Run | null {
    return this.store.get(runId);
  }

  /** Newest first. */
  listRuns(status?: RunStatus, limit = 20): Run[] {
    return Object.values(this.store.listAll())
      .reverse()
      .filter((run) => !status || run.status === status)
      .slice(0, Math.max(1, limit));
  }

  deleteRun(runId: string): boolean {
    if (!this.store.exists(runId)) return false;
    this.cancelRun(runId);
    const deleted = this.store.delete(runId);
    this.registry.releaseRun(runId);
    return deleted;
  }

  listTools(): Record<string, ToolInfo> {
    return this.registry.listTools();
  }

  health(): RuntimeHealth {
    return {
      workerAlive: !this.stopped,
      activeRuns: this.active.size,
      pendingRuns: this.pending.length,
      storedRuns: this.store.size,
      tools: this.registry.names(),
    };
  }

  /** Resolves once nothing is queued or in flight. */
  idle(): Promise<void> {
    if (this.pending.length === 0 && this.active.size === 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /** Stops accepting work and cancels everything queued or running. */
  async stop(): Promise<void> {
    this.stopped = true;
    for (const job of [...this.pending]) {
      this.cancelRun(job.runId);
    }
    for (const job of this.active.values()) {
      job.controller.abort();
    }
    await this.idle();
  }

  tick(): void {
    while (!this.stopped && this.active.size < this.config.maxParallelRuns) {
      const job = this.pending.shift();
      if (!job) break;
      this.active.set(job.runId, job);
      void this.process(job)
        .catch((error: unknown) => {
          console.error(`[queue] Run ${job.runId} crashed: ${errorMessage(error)}`);
          const run = this.store.get(job.runId);
          if (run && run.status !== "completed") {
            this.finishRun(run, `Execution error: ${errorMessage(error)}`, "execution_fault");
          }
        })
        .finally(() => {
          this.active.delete(job.runId);
          // a tool may have run after the delete released its state
          if (!this.store.exists(job.runId)) this.registry.releaseRun(job.runId);
          this.tick();
          this.notifyIdle();
        });
    }
  }

  private enqueue(kind: JobKind, runId: string): void {
    if (this.stopped) {
      throw new Error("Runtime queue is stopped");
    }
    this.pending.push({ kind, runId, controller: new AbortController() });
    this.tick();
  }

  private isScheduled(runId: string): boolean {
    return this.active.has(runId) || this.pending.some((job) => job.runId === runId);
  }

  private async process(job: Job): Promise<void> {
    const run = this.store.get(job.runId);
    if (!run) return;
    const { signal } = job.controller;

    if (job.kind === "resume") {
      await this.orchestrator.resumeRun(run, signal);
      this.persist(run);
      return;
    }

    let plan: Plan;
    try {
      plan = await this.planner.createPlan(run.prompt, signal);
    } catch (error) {
      if (signal.aborted) {
        this.finishRun(run, new RunCanceledError().message, "canceled");
      } else {
        this.finishRun(run, `Planning failed: ${errorMessage(error)}`, "planning_failed");
      }
      return;
    }
    console.log(`[queue] Run ${run.runId} planned with ${plan.steps.length} step(s)`);

    await this.orchestrator.executeRun(run, plan, signal);
    this.persist(run);
  }

  private finishRun(run: Run, error: string, kind: RunErrorKind): void {
    run.status = "failed";
    run.error = error;
    run.errorKind = kind;
    run.completedAt = new Date().toISOString();
    this.persist(run);
    console.warn(`[queue] Run ${run.runId} failed: ${error}`);
  }

  /** A run deleted while in flight stays deleted. */
  private persist(run: Run): void {
    if (this.store.exists(run.runId)) this.store.save(run);
  }

  private notifyIdle(): void {
    if (this.pending.length > 0 || this.active.size > 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
