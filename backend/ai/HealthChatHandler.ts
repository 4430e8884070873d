import {
  modelToolCallTurn,
  toolResultTurn,
  userTurn,
  type ConversationTurn,
  type ToolResult,
} from "../domain/Conversation";
import { CompletionUnavailableError, UpstreamFailureError } from "../errors";
import type { ToolRegistry } from "../maps/ToolRegistry";
import type { CompletionClient } from "./CompletionClient";

export interface HealthChatResponse {
  readonly response: string;
}

export interface HealthChatDeps {
  readonly completionClient: CompletionClient;
  readonly toolRegistry: ToolRegistry;
  readonly systemInstruction: string;
}

// One user turn, fixed two-step protocol:
//   1. request with tools offered
//   2. if the model asked for tools: run each once, then one final request without tools
// A second round of tool calls is not supported; the final request must answer in text.
export async function handleHealthChat(
  deps: HealthChatDeps,
  args: { readonly userMessage: string },
): Promise<HealthChatResponse> {
  if (!args.userMessage.trim()) throw new Error("userMessage must be a non-empty string.");

  const turns: ConversationTurn[] = [userTurn(args.userMessage)];

  const first = await deps.completionClient.complete({
    turns,
    systemInstruction: deps.systemInstruction,
    tools: deps.toolRegistry.declarations(),
  });

  if (first.kind === "text") return { response: first.value };

  const results: ToolResult[] = [];
  for (const call of first.calls) {
    if (!deps.toolRegistry.has(call.name)) {
      console.warn(`[Chat] Model requested unknown tool "${call.name}"`);
    }
    results.push(await deps.toolRegistry.execute(call));
  }

  turns.push(modelToolCallTurn(first.calls, first.parts), toolResultTurn(results));

  const final = await deps.completionClient.complete({
    turns,
    systemInstruction: deps.systemInstruction,
  });

  if (final.kind !== "text") {
    throw new UpstreamFailureError(
      "Model requested a second round of tool calls.",
      new CompletionUnavailableError("Unexpected tool calls in final completion.", "malformed_response"),
    );
  }
  return { response: final.value };
}
