import "dotenv/config";
import { createChunkingApp } from "./bootstrap.js";
import { loadConfig } from "./config/env.js";
import { describeError } from "./domain/errors.js";
import { createProxyHandler, toProxyResult } from "./http/lambdaHandler.js";
import type { ProxyEvent, ProxyHandler, ProxyResult } from "./http/lambdaHandler.js";

// Missing configuration fails the cold start rather than the first request.
const config = loadConfig();
let handlerPromise: Promise<ProxyHandler> | null = null;

export async function handler(event: ProxyEvent): Promise<ProxyResult> {
  if (!handlerPromise) {
    handlerPromise = createChunkingApp(config).then(({ pipeline }) =>
      createProxyHandler(pipeline, config.documentKey),
    );
  }

  let proxy: ProxyHandler;
  try {
    proxy = await handlerPromise;
  } catch (error) {
    handlerPromise = null;
    console.error("Failed to initialize chunking pipeline:", error);
    return toProxyResult(500, { error: describeError(error) });
  }
  return proxy(event);
}
