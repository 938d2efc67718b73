import { Hono } from "hono";
import type { RuntimeQueue } from "../runtime/queue.ts";

export function healthRoute(runtime: RuntimeQueue): Hono {
  const route = new Hono();

  route.get("/", (c) => {
    const health = runtime.health();
    return c.json({
      status: health.workerAlive ? "healthy" : "stopping",
      service: "agent-runtime",
      available_tools: health.tools.join(", "),
    });
  });

  return route;
}
