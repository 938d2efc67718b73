import { ToolRegistry } from "./base.ts";
import { Calculator } from "./calculator.ts";
import { TodoStore, type TodoStoreScope } from "./todo-store.ts";

export { ToolRegistry, validateInput } from "./base.ts";
export type { Tool, ToolContext } from "./base.ts";
export { Calculator } from "./calculator.ts";
export { TodoStore } from "./todo-store.ts";
export type { TodoStoreScope } from "./todo-store.ts";

export function createDefaultRegistry(options: { todoScope?: TodoStoreScope } = {}): ToolRegistry {
  const registry = new ToolRegistry();
  registry.register(new Calculator());
  registry.register(new TodoStore(options.todoScope));
  return registry;
}
