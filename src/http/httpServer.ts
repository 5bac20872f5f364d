import { createServer, IncomingMessage, ServerResponse } from "node:http";
import { describeError } from "../domain/errors.js";
import { CHAT_PATH, handleChatRequest } from "./chatApi.js";
import type { ChatPipeline } from "./chatApi.js";

const CORS_HEADERS = {
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Methods": "POST, OPTIONS",
  "Access-Control-Allow-Headers": "Content-Type, X-Api-Key",
};

export interface HttpServerOptions {
  host: string;
  port: number;
  pipeline: ChatPipeline;
  documentKey: string;
}

export interface RunningHttpServer {
  /** Bound port; differs from the requested one when that was 0. */
  port: number;
  close: () => Promise<void>;
}

export async function runHttpServer(options: HttpServerOptions): Promise<RunningHttpServer> {
  const { pipeline, documentKey } = options;

  const httpServer = createServer(async (req, res) => {
    try {
      const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

      if (url.pathname === "/healthz") {
        writeJson(res, 200, { ok: true });
        return;
      }

      if (url.pathname !== CHAT_PATH) {
        res.writeHead(404, { "Content-Type": "text/plain" });
        res.end("Not found");
        return;
      }

      if (req.method === "OPTIONS") {
        res.writeHead(204, CORS_HEADERS);
        res.end();
        return;
      }

      if (req.method !== "POST") {
        writeJson(res, 405, { error: "Method not allowed" });
        return;
      }

      const body = await readJsonBody(req);
      const reply = await handleChatRequest(body, pipeline, documentKey);
      if (reply.status !== 200) {
        console.error(`POST ${CHAT_PATH} failed: ${reply.body.error}`);
      }
      writeJson(res, reply.status, reply.body);
    } catch (error) {
      console.error(`${req.method ?? "?"} ${req.url ?? "/"} failed:`, error);
      if (!res.headersSent) {
        writeJson(res, 500, { error: describeError(error) });
      }
    }
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.listen(options.port, options.host, () => resolve());
    httpServer.once("error", reject);
  });

  const address = httpServer.address();
  const port = typeof address === "object" && address !== null ? address.port : options.port;

  return {
    port,
    close: async () => {
      await new Promise<void>((resolve, reject) => {
        httpServer.close((error) => {
          if (error) {
            reject(error);
            return;
          }
          resolve();
        });
      });
    },
  };
}

async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }

  const raw = Buffer.concat(chunks).toString("utf-8").trim();
  if (!raw) {
    return {};
  }

  try {
    return JSON.parse(raw);
  } catch {
    throw new Error("Invalid JSON body");
  }
}

function writeJson(res: ServerResponse, status: number, body: unknown) {
  res.writeHead(status, { "Content-Type": "application/json", ...CORS_HEADERS });
  res.end(JSON.stringify(body));
}
