import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "../config.ts";
import { buildRuntime } from "../runtime/index.ts";
import { registerToolHandlers } from "./tools.ts";

async function main(): Promise<void> {
  // stdout carries the protocol; route runtime logging to stderr.
  console.log = console.error;

  const config = loadConfig();
  const { queue } = buildRuntime(config);

  const server = new Server(
    {
      name: "agent-runtime-mcp",
      version: "0.1.0",
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  registerToolHandlers(server, queue);

  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((error) => {
  const message = error instanceof Error ? (error.stack ?? error.message) : String(error);
  console.error(message);
  process.exit(1);
});
