import { randomUUID } from "node:crypto";
import type { ToolInputSchema, ToolResult } from "../types.ts";
import type { Tool, ToolContext } from "./base.ts";

export type TodoStoreScope = "run" | "process";

const OPERATIONS = ["add", "list", "complete", "delete"] as const;
type Operation = (typeof OPERATIONS)[number];

const PROCESS_BUCKET = "*";

export interface Todo {
  id: string;
  title: string;
  description: string;
  completed: boolean;
  created_at: string;
  completed_at: string | null;
}

function isOperation(value: unknown): value is Operation {
  return typeof value === "string" && (OPERATIONS as readonly string[]).includes(value);
}

function stringField(input: Record<string, unknown>, field: string): string {
  const value = input[field];
  return typeof value === "string" ? value.trim() : "";
}

/**
 * In-memory todo list. With `run` scope every run sees only the items it
 * created (a resumed run keeps its own items); `process` scope shares one list
 * across all runs.
 */
export class TodoStore implements Tool {
  readonly name = "TodoStore";
  readonly description =
    "Manages todo items. Supports operations: add, list, complete, delete. State persists within the session.";
  readonly inputSchema: ToolInputSchema = {
    type: "object",
    properties: {
      operation: { type: "string", enum: [...OPERATIONS], description: "Operation to perform" },
      title: { type: "string", description: "Todo title (required for 'add')" },
      description: { type: "string", description: "Todo description (optional for 'add')" },
      todo_id: { type: "string", description: "Todo ID (required for 'complete' and 'delete')" },
    },
    required: ["operation"],
  };

  private readonly buckets = new Map<string, Map<string, Todo>>();

  constructor(readonly scope: TodoStoreScope = "run") {}

  isIdempotent(input: Record<string, unknown>): boolean {
    return input["operation"] !== "add";
  }

  execute(input: Record<string, unknown>, context: ToolContext): ToolResult {
    const operation = input["operation"];
    if (!operation) {
      return { success: false, error: "Missing required field: 'operation'" };
    }
    if (!isOperation(operation)) {
      return {
        success: false,
        error: `Invalid operation: '${String(operation)}'. Must be one of: ${OPERATIONS.join(", ")}`,
      };
    }

    const todos = this.bucket(context.runId);
    switch (operation) {
      case "add":
        return this.add(todos, input);
      case "list":
        return this.list(todos);
      case "complete":
        return this.complete(todos, input);
      case "delete":
        return this.remove(todos, input);
    }
  }

  /** Items visible to a run; in `process` scope every run gets the shared list. */
  snapshot(runId: string): Todo[] {
    const todos = this.buckets.get(this.bucketKey(runId));
    return todos ? [...todos.values()].map((todo) => ({ ...todo })) : [];
  }

  /** The shared `process` list outlives any single run. */
  releaseRun(runId: string): void {
    if (this.scope === "run") this.buckets.delete(runId);
  }

  /** Number of separate lists currently held. */
  get listCount(): number {
    return this.buckets.size;
  }

  private bucketKey(runId: string): string {
    return this.scope === "process" ? PROCESS_BUCKET : runId;
  }

  private bucket(runId: string): Map<string, Todo> {
    const key = this.bucketKey(runId);
    let todos = this.buckets.get(key);
    if (!todos) {
      todos = new Map();
      this.buckets.set(key, todos);
    }
    return todos;
  }

  private add(todos: Map<string, Todo>, input: Record<string, unknown>): ToolResult {
    const title = stringField(input, "title");
    if (!title) {
      return { success: false, error: "'title' is required for add operation" };
    }

    const description = input["description"];
    const todo: Todo = {
      id: randomUUID(),
      title,
      description: typeof description === "string" ? description : "",
      completed: false,
      created_at: new Date().toISOString(),
      completed_at: null,
    };
    todos.set(todo.id, todo);

    return { success: true, output: { message: "Todo added successfully", todo: { ...todo } } };
  }

  private list(todos: Map<string, Todo>): ToolResult {
    const items = [...todos.values()].map((todo) => ({ ...todo }));
    return { success: true, output: { count: items.length, todos: items } };
  }

  private complete(todos: Map<string, Todo>, input: Record<string, unknown>): ToolResult {
    const todoId = stringField(input, "todo_id");
    if (!todoId) {
      return { success: false, error: "'todo_id' is required for complete operation" };
    }

    const todo = todos.get(todoId);
    if (!todo) {
      return { success: false, error: `Todo with id '${todoId}' not found` };
    }
    if (todo.completed) {
      return { success: true, output: { message: "Todo was already completed", todo: { ...todo } } };
    }

    todo.completed = true;
    todo.completed_at = new Date().toISOString();
    return { success: true, output: { message: "Todo marked as completed", todo: { ...todo } } };
  }

  private remove(todos: Map<string, Todo>, input: Record<string, unknown>): ToolResult {
    const todoId = stringField(input, "todo_id");
    if (!todoId) {
      return { success: false, error: "'todo_id' is required for delete operation" };
    }

    const todo = todos.get(todoId);
    if (!todo) {
      return { success: false, error: `Todo with id '${todoId}' not found` };
    }
    todos.delete(todoId);

    return { success: true, output: { message: "Todo deleted successfully", deleted_todo: { ...todo } } };
  }
}
