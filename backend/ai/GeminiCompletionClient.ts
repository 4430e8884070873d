// Gemini completion client using the @google/genai SDK.
// Maps conversation turns to Gemini Content[] and back; supports function calling.

import { GoogleGenAI } from "@google/genai";
import type { Content, FunctionCall, FunctionDeclaration, GenerateContentConfig, Part } from "@google/genai";
import type { ConversationPart, ConversationTurn, ToolInvocationRequest } from "../domain/Conversation";
import { toJsonObject } from "../domain/Json";
import { CompletionUnavailableError, type CompletionFailureReason } from "../errors";
import type { ToolDeclaration } from "../maps/ToolRegistry";
import type { CompletionClient, CompletionRequest, CompletionResult } from "./CompletionClient";

export interface GeminiCompletionClientConfig {
  readonly apiKey: string;
  readonly model?: string;
  readonly timeoutMs?: number;
}

export const DEFAULT_GEMINI_MODEL = "gemini-2.5-flash";

function toFunctionDeclarations(tools: readonly ToolDeclaration[]): FunctionDeclaration[] {
  return tools.map((t) => ({
    name: t.name,
    description: t.description,
    parametersJsonSchema: t.parameters,
  }));
}

function toPart(part: ConversationPart): Part {
  switch (part.kind) {
    case "text":
      return { text: part.text };
    case "toolCall": {
      const { call } = part;
      const out: Part = { functionCall: { name: call.name, args: { ...call.arguments }, id: call.id } };
      if (call.signature) out.thoughtSignature = call.signature;
      return out;
    }
    case "toolResult":
      return {
        functionResponse: {
          name: part.result.name,
          id: part.result.id,
          response: { content: part.result.content },
        },
      };
    default: {
      const _exhaustiveCheck: never = part;
      throw new Error(`Unhandled part kind: ${JSON.stringify(_exhaustiveCheck)}`);
    }
  }
}

/**
 * Role mapping:
 *   user  -> "user"
 *   model -> "model" (functionCall parts)
 *   tool  -> "user"  (functionResponse parts)
 */
export function toGeminiContents(turns: readonly ConversationTurn[]): Content[] {
  return turns.map((turn) => ({
    role: turn.role === "model" ? "model" : "user",
    parts: turn.parts.map(toPart),
  }));
}

function toInvocation(fc: FunctionCall, signature?: string): ToolInvocationRequest {
  if (!fc.name) {
    throw new CompletionUnavailableError("Gemini returned a function call without a name.", "malformed_response");
  }
  return {
    name: fc.name,
    arguments: toJsonObject(fc.args ?? {}),
    ...(fc.id ? { id: fc.id } : {}),
    ...(signature ? { signature } : {}),
  };
}

type GeminiResponseLike = {
  readonly text?: string;
  readonly functionCalls?: FunctionCall[];
  readonly candidates?: readonly { readonly content?: Content }[];
};

// Function calls win over text: the endpoint must resolve them before answering.
export function readCompletionResult(response: GeminiResponseLike): CompletionResult {
  const candidateParts = response.candidates?.[0]?.content?.parts ?? [];
  const calls: ToolInvocationRequest[] = [];
  const replay: ConversationPart[] = [];
  for (const p of candidateParts) {
    if (p.functionCall) {
      const call = toInvocation(p.functionCall, p.thoughtSignature);
      calls.push(call);
      replay.push({ kind: "toolCall", call });
    } else if (typeof p.text === "string" && p.text && !p.thought) {
      replay.push({ kind: "text", text: p.text });
    }
  }
  if (calls.length) return { kind: "toolCalls", calls, parts: replay };

  if (response.functionCalls?.length) {
    return { kind: "toolCalls", calls: response.functionCalls.map((fc) => toInvocation(fc)) };
  }

  const text = response.text;
  if (typeof text !== "string" || !text.trim()) {
    throw new CompletionUnavailableError("Gemini returned neither text nor function calls.", "malformed_response");
  }
  return { kind: "text", value: text };
}

export function classifyError(err: unknown): CompletionFailureReason {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    if (err.status === 401 || err.status === 403) return "auth_failed";
    if (err.status === 429) return "throttled";
    if (err.status >= 500) return "transient_network";
  }
  if (err instanceof Error) {
    const msg = err.message.toLowerCase();
    if (msg.includes("api key") || msg.includes("unauthorized") || msg.includes("permission")) return "auth_failed";
    if (msg.includes("rate limit") || msg.includes("quota") || msg.includes("resource exhausted")) return "throttled";
    if (err.name === "AbortError" || msg.includes("network") || msg.includes("fetch") || msg.includes("econn") || msg.includes("timed out")) {
      return "transient_network";
    }
  }
  return "unknown";
}

export class GeminiCompletionClient implements CompletionClient {
  readonly name = "gemini";
  private readonly client: GoogleGenAI;
  readonly model: string;

  constructor(config: GeminiCompletionClientConfig) {
    if (!config.apiKey.trim()) throw new Error("Gemini API key is required.");
    this.client = new GoogleGenAI({
      apiKey: config.apiKey,
      ...(config.timeoutMs ? { httpOptions: { timeout: config.timeoutMs } } : {}),
    });
    this.model = config.model ?? DEFAULT_GEMINI_MODEL;
  }

  async complete(request: CompletionRequest): Promise<CompletionResult> {
    const config: GenerateContentConfig = { systemInstruction: request.systemInstruction };
    if (request.tools && request.tools.length > 0) {
      config.tools = [{ functionDeclarations: toFunctionDeclarations(request.tools) }];
    }

    let response: GeminiResponseLike;
    try {
      response = await this.client.models.generateContent({
        model: this.model,
        contents: toGeminiContents(request.turns),
        config,
      });
    } catch (err) {
      throw new CompletionUnavailableError(
        `Gemini API error: ${err instanceof Error ? err.message : String(err)}`,
        classifyError(err),
        err,
      );
    }

    return readCompletionResult(response);
  }
}
