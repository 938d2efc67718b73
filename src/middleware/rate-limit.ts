import type { Context, MiddlewareHandler } from "hono";

export interface RateLimitOptions {
  windowMs: number;
  max: number;
  /** Only requests with these methods count; all methods when omitted. */
  methods?: string[];
  /** Key clients by X-Forwarded-For / X-Real-IP. Only safe behind a proxy that overwrites them. */
  trustProxy?: boolean;
  /** Peer address of the connection, when the server adapter exposes one. */
  clientAddress?: (c: Context) => string | undefined;
  now?: () => number;
  /** Request times per client key, oldest first. */
  hits?: Map<string, number[]>;
}

const UNKNOWN_CLIENT = "unknown";

function clientKey(c: Context, options: RateLimitOptions): string {
  if (options.trustProxy) {
    const forwarded = c.req.header("x-forwarded-for")?.split(",")[0]?.trim();
    if (forwarded) return forwarded;
    const realIp = c.req.header("x-real-ip")?.trim();
    if (realIp) return realIp;
  }
  return options.clientAddress?.(c) || UNKNOWN_CLIENT;
}

function withinWindow(times: number[], now: number, windowMs: number): number[] {
  const firstLive = times.findIndex((t) => now - t < windowMs);
  return firstLive < 0 ? [] : times.slice(firstLive);
}

/**
 * Sliding-window limiter keyed by client. Clients with no request in the last
 * window are swept at most once per window, so idle keys do not accumulate.
 */
export function rateLimit(options: RateLimitOptions): MiddlewareHandler {
  const { windowMs, max } = options;
  const now = options.now ?? Date.now;
  const methods = options.methods ? new Set(options.methods.map((m) => m.toUpperCase())) : null;
  const hits = options.hits ?? new Map<string, number[]>();
  let lastSweep = now();

  const sweep = (at: number): void => {
    for (const [key, times] of hits) {
      const newest = times[times.length - 1];
      if (newest === undefined || at - newest >= windowMs) hits.delete(key);
    }
    lastSweep = at;
  };

  return async (c, next) => {
    if (methods && !methods.has(c.req.method)) {
      await next();
      return;
    }

    const at = now();
    if (at - lastSweep >= windowMs) sweep(at);

    const key = clientKey(c, options);
    const times = withinWindow(hits.get(key) ?? [], at, windowMs);
    const oldest = times[0];
    if (times.length >= max && oldest !== undefined) {
      hits.set(key, times);
      const retryAfterSec = Math.max(1, Math.ceil((windowMs - (at - oldest)) / 1000));
      c.header("Retry-After", retryAfterSec.toString());
      return c.json({ error: { code: "RATE_LIMITED", message: "Too many requests" } }, 429);
    }

    times.push(at);
    hits.set(key, times);
    await next();
  };
}
