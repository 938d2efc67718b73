/** Raised when a prompt or a model reply cannot be turned into a valid plan. */
export class PlanningError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PlanningError";
  }
}

/**
 * A fault raised while invoking a tool. Permanent faults fail the same way on
 * every attempt; the executor may skip retrying them.
 */
export class ToolFault extends Error {
  constructor(
    message: string,
    readonly permanent: boolean
  ) {
    super(message);
    this.name = "ToolFault";
  }
}

export class ToolNotFoundError extends ToolFault {
  constructor(readonly toolName: string) {
    super(`Tool '${toolName}' not found in registry`, true);
    this.name = "ToolNotFoundError";
  }
}

export class StepTimeoutError extends ToolFault {
  constructor(stepNumber: number, timeoutSeconds: number) {
    super(`Step ${stepNumber} timed out after ${timeoutSeconds}s`, false);
    this.name = "StepTimeoutError";
  }
}

export class RunCanceledError extends Error {
  constructor() {
    super("Run canceled");
    this.name = "RunCanceledError";
  }
}

export class RunNotResumableError extends Error {
  constructor(message = "Run cannot be resumed") {
    super(message);
    this.name = "RunNotResumableError";
  }
}

export function isPermanentFault(error: unknown): boolean {
  return error instanceof ToolFault && error.permanent;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
