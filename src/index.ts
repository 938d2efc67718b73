import { serve } from "@hono/node-server";
import { getConnInfo } from "@hono/node-server/conninfo";
import { buildApp } from "./app.ts";
import { loadConfig } from "./config.ts";
import { OllamaClient } from "./ollama-client.ts";
import { buildRuntime } from "./runtime/index.ts";

async function main(): Promise<void> {
  const config = loadConfig();
  const ollama = new OllamaClient(config.ollamaUrl);
  const { queue, registry } = buildRuntime(config, { chatClient: ollama });

  console.log(`[server] Available tools: ${registry.names().join(", ")}`);
  if (!(await ollama.ping())) {
    console.warn(`[server] Make sure Ollama is running (ollama serve) and ${config.ollamaModel} is pulled`);
  }

  const app = buildApp(queue, {
    rateLimitPerMinute: config.rateLimitPerMinute,
    trustProxy: config.trustProxy,
    clientAddress: (c) => getConnInfo(c).remote.address,
  });
  const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
    console.log(`[server] Listening on http://${config.host}:${info.port}`);
  });

  const shutdown = (signal: string) => {
    console.log(`[server] ${signal} received, shutting down`);
    server.close();
    queue
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error("[server] Shutdown failed:", error);
        process.exit(1);
      });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error) => {
  const message = error instanceof Error ? (error.stack ?? error.message) : String(error);
  console.error(message);
  process.exit(1);
});
