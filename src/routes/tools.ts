import { Hono } from "hono";
import type { RuntimeQueue } from "../runtime/queue.ts";

export function toolsRoute(runtime: RuntimeQueue): Hono {
  const route = new Hono();
  route.get("/", (c) => c.json(runtime.listTools()));
  return route;
}
