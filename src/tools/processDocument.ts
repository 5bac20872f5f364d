import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { handleChatRequest } from "../http/chatApi.js";
import type { ChatPipeline } from "../http/chatApi.js";

export function registerProcessDocumentTool(
  server: McpServer,
  pipeline: ChatPipeline,
  defaultDocumentKey: string,
) {
  server.registerTool(
    "process_document",
    {
      title: "Process Document",
      description:
        "Splits the stored document into chunks (reusing the cached chunk set when present) and reports the chunk count.",
      inputSchema: {
        question: z.string().describe("Question about the document"),
        document_key: z
          .string()
          .min(1)
          .optional()
          .describe(`Storage key of the document (default: ${defaultDocumentKey})`),
      },
    },
    async ({ question, document_key }) => {
      const reply = await handleChatRequest({ question, document_key }, pipeline, defaultDocumentKey);

      return {
        content: [
          {
            type: "text",
            text: JSON.stringify(reply.body, null, 2),
          },
        ],
        isError: reply.status !== 200,
      };
    },
  );
}
