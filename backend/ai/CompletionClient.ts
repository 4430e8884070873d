import type { ConversationPart, ConversationTurn, ToolInvocationRequest } from "../domain/Conversation";
import type { ToolDeclaration } from "../maps/ToolRegistry";

export type CompletionRequest = Readonly<{
  turns: readonly ConversationTurn[];
  systemInstruction: string;

  // Empty or absent means no tool is offered to the model.
  tools?: readonly ToolDeclaration[];
}>;

export type CompletionResult =
  | { readonly kind: "text"; readonly value: string }
  | {
      readonly kind: "toolCalls";
      readonly calls: readonly ToolInvocationRequest[];
      // Everything the model returned alongside the calls, in order, for replay.
      readonly parts?: readonly ConversationPart[];
    };

// Narrow boundary to the hosted model.
// Implementations MUST reject with CompletionUnavailableError on any backend failure
// (network, auth, rate limit, malformed response) and MUST NOT retry.
export interface CompletionClient {
  readonly name: string;
  complete(request: CompletionRequest): Promise<CompletionResult>;
}
