import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import "dotenv/config";
import { createChunkingApp } from "./bootstrap.js";
import { loadConfig } from "./config/env.js";
import { CHAT_PATH } from "./http/chatApi.js";
import type { ChatPipeline } from "./http/chatApi.js";
import { runHttpServer } from "./http/httpServer.js";
import { registerProcessDocumentTool } from "./tools/processDocument.js";

async function main() {
  const config = loadConfig();
  const { pipeline, close } = await createChunkingApp(config);
  const shutdownTasks: Array<() => Promise<void>> = [close];

  if (config.transport === "http") {
    const httpServer = await runHttpServer({
      host: config.host,
      port: config.port,
      pipeline,
      documentKey: config.documentKey,
    });
    shutdownTasks.unshift(httpServer.close);
    console.error(
      `Chat API listening on http://${config.host}:${httpServer.port}${CHAT_PATH} (bucket ${config.bucketName}, ${config.storageBackend} storage)`,
    );
  } else {
    await runStdioServer(createAppServer(pipeline, config.documentKey));
  }

  const shutdown = async () => {
    for (const task of shutdownTasks) {
      await task();
    }
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error) => {
      console.error("Shutdown failed:", error);
      process.exit(1);
    });
  };

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

function createAppServer(pipeline: ChatPipeline, documentKey: string): McpServer {
  const server = new McpServer({
    name: "doc-chunk-cache",
    version: "0.1.0",
  });

  registerProcessDocumentTool(server, pipeline, documentKey);

  return server;
}

async function runStdioServer(server: McpServer): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((error) => {
  console.error("Failed to start chat API:", error);
  process.exit(1);
});
