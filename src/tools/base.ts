import { ToolNotFoundError } from "../errors.ts";
import type { ToolInfo, ToolInputSchema, ToolResult } from "../types.ts";

export interface ToolContext {
  runId: string;
  signal: AbortSignal;
}

export interface Tool {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: ToolInputSchema;
  execute(input: Record<string, unknown>, context: ToolContext): ToolResult | Promise<ToolResult>;
  /**
   * Whether a completed invocation with this input may have already happened
   * when a failed run is resumed. Tools that omit it are treated as idempotent.
   */
  isIdempotent?(input: Record<string, unknown>): boolean;
  /** Drops any state kept for a run that has been deleted. */
  releaseRun?(runId: string): void;
}

function matchesType(value: unknown, type: ToolInputSchema["properties"][string]["type"]): boolean {
  switch (type) {
    case "string":
      return typeof value === "string";
    case "number":
      return typeof value === "number" && !Number.isNaN(value);
    case "integer":
      return typeof value === "number" && Number.isInteger(value);
    case "boolean":
      return typeof value === "boolean";
  }
}

/** Checks required fields and primitive types only; nested shapes, enums and ranges are left to the tool. */
export function validateInput(schema: ToolInputSchema, input: Record<string, unknown>): boolean {
  for (const field of schema.required ?? []) {
    if (!(field in input)) return false;
  }

  for (const [field, value] of Object.entries(input)) {
    const fieldSchema = schema.properties[field];
    if (!fieldSchema) continue;
    if (!matchesType(value, fieldSchema.type)) return false;
  }

  return true;
}

export class ToolRegistry {
  private readonly tools = new Map<string, Tool>();

  register(tool: Tool): void {
    this.tools.set(tool.name, tool);
  }

  get(name: string): Tool {
    const tool = this.tools.get(name);
    if (!tool) throw new ToolNotFoundError(name);
    return tool;
  }

  exists(name: string): boolean {
    return this.tools.has(name);
  }

  releaseRun(runId: string): void {
    for (const tool of this.tools.values()) {
      tool.releaseRun?.(runId);
    }
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  listTools(): Record<string, ToolInfo> {
    const listing: Record<string, ToolInfo> = {};
    for (const [name, tool] of this.tools) {
      listing[name] = {
        name: tool.name,
        description: tool.description,
        input_schema: tool.inputSchema,
      };
    }
    return listing;
  }
}
