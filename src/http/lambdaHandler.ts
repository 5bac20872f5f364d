import { handleChatRequest } from "./chatApi.js";
import type { ChatPipeline } from "./chatApi.js";

/** The subset of an API gateway proxy event the chat route reads. */
export interface ProxyEvent {
  body?: string | null;
  isBase64Encoded?: boolean;
}

export interface ProxyResult {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
}

export type ProxyHandler = (event: ProxyEvent) => Promise<ProxyResult>;

export function createProxyHandler(pipeline: ChatPipeline, defaultDocumentKey: string): ProxyHandler {
  return async (event) => {
    let body: unknown;
    try {
      body = parseEventBody(event);
    } catch (error) {
      return toProxyResult(500, {
        error: error instanceof Error ? error.message : "Invalid JSON body",
      });
    }

    const reply = await handleChatRequest(body, pipeline, defaultDocumentKey);
    return toProxyResult(reply.status, reply.body);
  };
}

function parseEventBody(event: ProxyEvent): unknown {
  if (!event.body) {
    return {};
  }
  const raw = event.isBase64Encoded
    ? Buffer.from(event.body, "base64").toString("utf-8")
    : event.body;
  if (!raw.trim()) {
    return {};
  }

  try {
    return JSON.parse(raw);
  } catch {
    throw new Error("Invalid JSON body");
  }
}

export function toProxyResult(statusCode: number, body: unknown): ProxyResult {
  return {
    statusCode,
    headers: {
      "Content-Type": "application/json",
      "Access-Control-Allow-Origin": "*",
    },
    body: JSON.stringify(body),
  };
}
