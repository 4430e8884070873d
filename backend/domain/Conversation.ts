import type { JsonValue } from "./Json";

// NOTE: These are per-request contracts only.
// - Built fresh for every POST /chat.
// - Never persisted, never shared between requests.

export type TurnRole = "user" | "model" | "tool";

export interface ToolInvocationRequest {
  readonly name: string;
  readonly arguments: Readonly<Record<string, JsonValue>>;

  // Upstream call id, echoed back on the matching result when present.
  readonly id?: string;

  // Opaque upstream signature that must accompany the call when it is replayed.
  readonly signature?: string;
}

export interface ToolResult {
  readonly name: string;
  readonly content: string;
  readonly id?: string;
}

export type ConversationPart =
  | { readonly kind: "text"; readonly text: string }
  | { readonly kind: "toolCall"; readonly call: ToolInvocationRequest }
  | { readonly kind: "toolResult"; readonly result: ToolResult };

export interface ConversationTurn {
  readonly role: TurnRole;
  readonly parts: readonly ConversationPart[];
}

export function userTurn(text: string): ConversationTurn {
  return { role: "user", parts: [{ kind: "text", text }] };
}

export function modelToolCallTurn(
  calls: readonly ToolInvocationRequest[],
  parts?: readonly ConversationPart[],
): ConversationTurn {
  return { role: "model", parts: parts ?? calls.map((call) => ({ kind: "toolCall", call })) };
}

export function toolResultTurn(results: readonly ToolResult[]): ConversationTurn {
  return { role: "tool", parts: results.map((result) => ({ kind: "toolResult", result })) };
}
