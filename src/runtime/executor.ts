import { setTimeout as delay } from "node:timers/promises";
import {
  errorMessage,
  isPermanentFault,
  RunCanceledError,
  RunNotResumableError,
  StepTimeoutError,
} from "../errors.ts";
import type { ToolRegistry } from "../tools/base.ts";
import type { ExecutionLogEntry, Plan, PlanStep, Run, RunErrorKind, ToolResult } from "../types.ts";

export interface ExecutionConfig {
  /** Additional attempts after the first one. */
  maxRetries: number;
  /** Seconds to wait before the second attempt. */
  initialRetryDelay: number;
  backoffMultiplier: number;
  /** Hard per-attempt deadline in seconds. */
  stepTimeout: number;
  /** When false, faults that fail identically every time (unknown tool) are not retried. */
  retryPermanentFaults: boolean;
}

export const DEFAULT_EXECUTION_CONFIG: Readonly<ExecutionConfig> = {
  maxRetries: 2,
  initialRetryDelay: 1.0,
  backoffMultiplier: 2.0,
  stepTimeout: 30.0,
  retryPermanentFaults: true,
};

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Longest delay a Node timer honours; anything larger fires after 1ms. */
export const MAX_TIMER_MS = 2_147_483_647;

function timerMs(seconds: number): number {
  return Math.min(MAX_TIMER_MS, Math.max(1, Math.floor(seconds * 1000)));
}

const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

function nowIso(): string {
  return new Date().toISOString();
}

/** Delay in seconds slept before `attempt` (2 or later). */
export function backoffDelay(config: ExecutionConfig, attempt: number): number {
  return config.initialRetryDelay * config.backoffMultiplier ** (attempt - 2);
}

export class Orchestrator {
  readonly config: Readonly<ExecutionConfig>;
  private readonly sleep: Sleep;

  constructor(
    private readonly registry: ToolRegistry,
    config: Partial<ExecutionConfig> = {},
    options: { sleep?: Sleep } = {}
  ) {
    this.config = Object.freeze({ ...DEFAULT_EXECUTION_CONFIG, ...config });
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Executes every step of `plan` in order against `run`, stopping at the
   * first step that still fails after its retries. Never throws: every fault
   * ends up as a failed run.
   */
  async executeRun(run: Run, plan: Plan, signal?: AbortSignal): Promise<Run> {
    run.plan = plan;
    return this.drive(run, plan.steps, signal, false);
  }

  canRetryRun(run: Run): boolean {
    if (run.status !== "failed") return false;
    return run.executionLog
      .filter((entry) => entry.status === "completed")
      .every((entry) => this.isReplaySafe(entry));
  }

  /** Re-executes the steps after the highest completed step number. */
  async resumeRun(run: Run, signal?: AbortSignal): Promise<Run> {
    if (!this.canRetryRun(run)) {
      throw new RunNotResumableError();
    }
    const plan = run.plan;
    if (!plan) {
      throw new RunNotResumableError("Run has no plan to resume");
    }

    const lastCompletedStep = run.executionLog
      .filter((entry) => entry.status === "completed")
      .reduce((max, entry) => Math.max(max, entry.stepNumber), 0);

    run.completedAt = null;
    const remaining = plan.steps.filter((step) => step.stepNumber > lastCompletedStep);
    console.log(`[executor] Resuming run ${run.runId} after step ${lastCompletedStep}`);
    return this.drive(run, remaining, signal, true);
  }

  private async drive(run: Run, steps: PlanStep[], signal: AbortSignal | undefined, resuming: boolean): Promise<Run> {
    run.status = "running";

    try {
      for (const step of steps) {
        if (signal?.aborted) {
          this.failRun(run, new RunCanceledError().message, "canceled");
          return run;
        }

        const entry = await this.executeStepWithRetry(run.runId, step, signal);
        run.executionLog.push(entry);

        if (entry.status === "failed") {
          if (signal?.aborted) {
            this.failRun(run, new RunCanceledError().message, "canceled");
          } else {
            const label = resuming ? "failed on resume" : "failed";
            this.failRun(run, `Step ${step.stepNumber} ${label}: ${entry.error ?? "unknown error"}`, "step_failed");
          }
          return run;
        }
      }

      run.status = "completed";
      run.completedAt = nowIso();
      if (resuming) {
        run.error = null;
        run.errorKind = null;
      }
      console.log(`[executor] Run ${run.runId} completed (${run.executionLog.length} log entries)`);
    } catch (error) {
      const prefix = resuming ? "Resume execution error" : "Execution error";
      this.failRun(run, `${prefix}: ${errorMessage(error)}`, "execution_fault");
    }

    return run;
  }

  private async executeStepWithRetry(
    runId: string,
    step: PlanStep,
    signal: AbortSignal | undefined
  ): Promise<ExecutionLogEntry> {
    let attempt = 0;
    let retryDelay = this.config.initialRetryDelay;

    for (;;) {
      attempt += 1;
      const entry: ExecutionLogEntry = {
        stepNumber: step.stepNumber,
        tool: step.tool,
        input: { ...step.input },
        output: null,
        status: "running",
        error: null,
        attempt,
        startedAt: nowIso(),
        completedAt: null,
      };

      let permanent = false;
      try {
        const result = await this.invokeTool(runId, step, signal);
        entry.output = result.output ?? null;
        entry.error = result.success ? null : (result.error ?? "Tool reported failure without an error");
        entry.status = result.success ? "completed" : "failed";
        entry.completedAt = nowIso();
        if (result.success) return entry;
      } catch (error) {
        entry.status = "failed";
        entry.error = `Execution exception: ${errorMessage(error)}`;
        entry.completedAt = nowIso();
        permanent = isPermanentFault(error);
      }

      if (signal?.aborted) return entry;
      if (permanent && !this.config.retryPermanentFaults) return entry;
      if (attempt > this.config.maxRetries) return entry;

      console.warn(
        `[executor] Step ${step.stepNumber} failed (attempt ${attempt}), retrying in ${retryDelay}s: ${entry.error}`
      );
      try {
        await this.sleep(Math.min(MAX_TIMER_MS, retryDelay * 1000), signal);
      } catch (error) {
        if (signal?.aborted) return entry;
        throw error;
      }
      retryDelay *= this.config.backoffMultiplier;
    }
  }

  private async invokeTool(runId: string, step: PlanStep, signal: AbortSignal | undefined): Promise<ToolResult> {
    const tool = this.registry.get(step.tool);
    const timeoutMs = timerMs(this.config.stepTimeout);
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    let onAbort: (() => void) | undefined;

    const interrupted = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new StepTimeoutError(step.stepNumber, this.config.stepTimeout));
        controller.abort();
      }, timeoutMs);
      if (signal) {
        onAbort = () => {
          reject(new RunCanceledError());
          controller.abort();
        };
        if (signal.aborted) onAbort();
        else signal.addEventListener("abort", onAbort, { once: true });
      }
    });

    try {
      const execution = Promise.resolve().then(() =>
        tool.execute({ ...step.input }, { runId, signal: controller.signal })
      );
      execution.catch((error: unknown) => {
        if (controller.signal.aborted) {
          console.warn(`[executor] Step ${step.stepNumber} settled after interruption: ${errorMessage(error)}`);
        }
      });
      return await Promise.race([execution, interrupted]);
    } finally {
      if (timer) clearTimeout(timer);
      if (signal && onAbort) signal.removeEventListener("abort", onAbort);
    }
  }

  private isReplaySafe(entry: ExecutionLogEntry): boolean {
    if (!this.registry.exists(entry.tool)) return true;
    const tool = this.registry.get(entry.tool);
    return tool.isIdempotent ? tool.isIdempotent(entry.input) : true;
  }

  private failRun(run: Run, error: string, kind: RunErrorKind): void {
    run.status = "failed";
    run.error = error;
    run.errorKind = kind;
    run.completedAt = nowIso();
    console.warn(`[executor] Run ${run.runId} failed: ${error}`);
  }
}
