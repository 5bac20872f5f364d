import { z } from "zod";
import type { PipelineResult } from "../domain/types.js";

export const CHAT_PATH = "/chat";

const chatRequestSchema = z.object({
  question: z.string().default(""),
  document_key: z.string().trim().min(1).optional(),
});

export type ChatRequest = z.infer<typeof chatRequestSchema>;

export type ChatReply =
  | { status: 200; body: { answer: string } }
  | { status: 500; body: { error: string } };

export interface ChatPipeline {
  process(documentKey: string, question: string): Promise<PipelineResult>;
}

export function parseChatRequest(body: unknown): ChatRequest {
  const parsed = chatRequestSchema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join(".") || "body";
    throw new Error(`Invalid request ${field}: ${issue?.message ?? "unexpected shape"}`);
  }
  return parsed.data;
}

export function toChatReply(result: PipelineResult): ChatReply {
  if (result.ok) {
    return { status: 200, body: { answer: result.answer } };
  }
  return { status: 500, body: { error: result.error } };
}

export async function handleChatRequest(
  body: unknown,
  pipeline: ChatPipeline,
  defaultDocumentKey: string,
): Promise<ChatReply> {
  let request: ChatRequest;
  try {
    request = parseChatRequest(body);
  } catch (error) {
    return toChatReply({
      ok: false,
      error: error instanceof Error ? error.message : "Invalid request body",
    });
  }

  const result = await pipeline.process(request.document_key ?? defaultDocumentKey, request.question);
  return toChatReply(result);
}
