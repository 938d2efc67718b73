import { Hono, type Context } from "hono";
import { bodyLimit } from "hono/body-limit";
import { cors } from "hono/cors";
import { logger } from "hono/logger";
import { rateLimit } from "./middleware/rate-limit.ts";
import { healthRoute } from "./routes/health.ts";
import { runsRoute } from "./routes/runs.ts";
import { toolsRoute } from "./routes/tools.ts";
import type { RuntimeQueue } from "./runtime/queue.ts";

export interface AppOptions {
  rateLimitPerMinute?: number;
  /** Rate-limit by X-Forwarded-For instead of the peer address. */
  trustProxy?: boolean;
  clientAddress?: (c: Context) => string | undefined;
  /** Request logging; off in tests. */
  accessLog?: boolean;
}

export function buildApp(runtime: RuntimeQueue, options: AppOptions = {}): Hono {
  const app = new Hono();

  if (options.accessLog ?? true) {
    app.use("*", logger());
  }
  app.use("*", bodyLimit({ maxSize: 1024 * 1024 }));
  app.use("*", cors());
  app.use(
    "*",
    rateLimit({
      windowMs: 60 * 1000,
      max: options.rateLimitPerMinute ?? 200,
      methods: ["POST", "DELETE"],
      trustProxy: options.trustProxy,
      clientAddress: options.clientAddress,
    })
  );
  app.use("*", async (c, next) => {
    await next();
    c.header("X-Content-Type-Options", "nosniff");
    c.header("X-Frame-Options", "DENY");
    c.header("Cache-Control", "no-store");
  });

  app.route("/health", healthRoute(runtime));
  app.route("/runs", runsRoute(runtime));
  app.route("/tools", toolsRoute(runtime));

  app.notFound((c) => c.json({ error: { code: "NOT_FOUND", message: `No route for ${c.req.method} ${c.req.path}` } }, 404));

  app.onError((err, c) => {
    console.error(`[server] Unhandled error on ${c.req.method} ${c.req.path}:`, err);
    return c.json({ error: { code: "INTERNAL_ERROR", message: `Internal server error: ${err.message}` } }, 500);
  });

  return app;
}
