import { describe, expect, it, vi } from "vitest";
import type { ConversationTurn } from "../domain/Conversation";
import { MOCK_USER_LOCATION } from "../domain/Location";
import { CompletionUnavailableError, UpstreamFailureError } from "../errors";
import { NO_FACILITY_ADVISORY } from "../maps/HospitalFinder";
import { HOSPITAL_TOOL_DECLARATION, ToolRegistry, createHospitalTool } from "../maps/ToolRegistry";
import type { CompletionClient, CompletionRequest, CompletionResult } from "./CompletionClient";
import { handleHealthChat } from "./HealthChatHandler";

const PULMONOLOGY_GOVERNMENT =
  "Found 2 hospitals near your mock location. **Govt. City Hospital** (4km, free care available) " +
  "and **Dr. R.K. Clinic** (6km, General Practitioner, low cost). " +
  "Please use Feature 1: Hospital Locator & Details for navigation and real-time availability.";

class FakeCompletionClient implements CompletionClient {
  readonly name = "fake";
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly replies: (CompletionResult | Error)[]) {}

  async complete(request: CompletionRequest): Promise<CompletionResult> {
    // Snapshot: the handler keeps appending to the same turn list.
    this.requests.push({ ...request, turns: [...request.turns] });
    const next = this.replies.shift();
    if (!next) throw new Error("FakeCompletionClient ran out of replies");
    if (next instanceof Error) throw next;
    return next;
  }
}

function deps(client: CompletionClient, find = vi.fn((): string => PULMONOLOGY_GOVERNMENT)) {
  const toolRegistry = new ToolRegistry([
    createHospitalTool({ locationFallback: "mock", fallbackLocation: MOCK_USER_LOCATION, find }),
  ]);
  return { deps: { completionClient: client, toolRegistry, systemInstruction: "be kind" }, find };
}

describe("handleHealthChat", () => {
  it("returns a text answer verbatim after one request", async () => {
    const client = new FakeCompletionClient([{ kind: "text", value: "[ADVICE] Rest and hydrate." }]);
    const { deps: d, find } = deps(client);

    const reply = await handleHealthChat(d, { userMessage: "I have a cold" });

    expect(reply).toEqual({ response: "[ADVICE] Rest and hydrate." });
    expect(client.requests).toHaveLength(1);
    expect(client.requests[0]).toEqual({
      turns: [{ role: "user", parts: [{ kind: "text", text: "I have a cold" }] }],
      systemInstruction: "be kind",
      tools: [HOSPITAL_TOOL_DECLARATION],
    });
    expect(find).not.toHaveBeenCalled();
  });

  it("resolves one hospital lookup and returns the final answer", async () => {
    const call = { name: "find_nearest_hospital", arguments: { specialty: "pulmonology", type: "government" } };
    const client = new FakeCompletionClient([
      { kind: "toolCalls", calls: [call] },
      { kind: "text", value: "[REFERRAL] Govt. City Hospital offers free care." },
    ]);
    const { deps: d, find } = deps(client);

    const reply = await handleHealthChat(d, { userMessage: "What's the cheapest place for lung problems?" });

    expect(reply.response).toBe("[REFERRAL] Govt. City Hospital offers free care.");
    expect(find).toHaveBeenCalledTimes(1);
    expect(find).toHaveBeenCalledWith({
      specialty: "pulmonology",
      facilityType: "government",
      location: { latitude: 40.7128, longitude: -74.006 },
    });

    const expectedTurns: ConversationTurn[] = [
      { role: "user", parts: [{ kind: "text", text: "What's the cheapest place for lung problems?" }] },
      { role: "model", parts: [{ kind: "toolCall", call }] },
      {
        role: "tool",
        parts: [{ kind: "toolResult", result: { name: "find_nearest_hospital", content: PULMONOLOGY_GOVERNMENT } }],
      },
    ];
    expect(client.requests).toHaveLength(2);
    expect(client.requests[1]).toEqual({ turns: expectedTurns, systemInstruction: "be kind" });
  });

  it("replays text the model sent alongside its tool calls", async () => {
    const call = { name: "find_nearest_hospital", arguments: { specialty: "pulmonology", type: "government" } };
    const client = new FakeCompletionClient([
      {
        kind: "toolCalls",
        calls: [call],
        parts: [
          { kind: "text", text: "Let me look that up." },
          { kind: "toolCall", call },
        ],
      },
      { kind: "text", value: "[REFERRAL] Govt. City Hospital." },
    ]);
    const { deps: d } = deps(client);

    await handleHealthChat(d, { userMessage: "lungs" });

    expect(client.requests[1]?.turns[1]).toEqual({
      role: "model",
      parts: [
        { kind: "text", text: "Let me look that up." },
        { kind: "toolCall", call },
      ],
    });
  });

  it("answers unknown tools with 'Tool not found' and still finalizes", async () => {
    const client = new FakeCompletionClient([
      {
        kind: "toolCalls",
        calls: [
          { name: "book_appointment", arguments: {} },
          { name: "find_nearest_hospital", arguments: { specialty: "oncology", type: "private" } },
        ],
      },
      { kind: "text", value: "[ADVICE] Please see a GP." },
    ]);
    const toolRegistry = new ToolRegistry([
      createHospitalTool({ locationFallback: "mock", fallbackLocation: MOCK_USER_LOCATION }),
    ]);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    const reply = await handleHealthChat(
      { completionClient: client, toolRegistry, systemInstruction: "be kind" },
      { userMessage: "book me in" },
    );

    expect(reply.response).toBe("[ADVICE] Please see a GP.");
    expect(client.requests[1]?.turns[2]).toEqual({
      role: "tool",
      parts: [
        { kind: "toolResult", result: { name: "book_appointment", content: "Tool not found" } },
        { kind: "toolResult", result: { name: "find_nearest_hospital", content: NO_FACILITY_ADVISORY } },
      ],
    });
    expect(warn).toHaveBeenCalledWith('[Chat] Model requested unknown tool "book_appointment"');
    warn.mockRestore();
  });

  it("propagates a failure on the first request without running tools", async () => {
    const failure = new CompletionUnavailableError("Gemini API error: boom", "unknown");
    const client = new FakeCompletionClient([failure]);
    const { deps: d, find } = deps(client);

    await expect(handleHealthChat(d, { userMessage: "hi" })).rejects.toBe(failure);
    expect(find).not.toHaveBeenCalled();
  });

  it("propagates a failure on the final request", async () => {
    const failure = new CompletionUnavailableError("Gemini API error: quota", "throttled");
    const client = new FakeCompletionClient([
      { kind: "toolCalls", calls: [{ name: "find_nearest_hospital", arguments: { specialty: "x", type: "y" } }] },
      failure,
    ]);
    const { deps: d, find } = deps(client);

    await expect(handleHealthChat(d, { userMessage: "hi" })).rejects.toBe(failure);
    expect(find).toHaveBeenCalledTimes(1);
  });

  it("refuses a second round of tool calls", async () => {
    const call = { name: "find_nearest_hospital", arguments: { specialty: "x", type: "y" } };
    const client = new FakeCompletionClient([
      { kind: "toolCalls", calls: [call] },
      { kind: "toolCalls", calls: [call] },
    ]);
    const { deps: d, find } = deps(client);

    await expect(handleHealthChat(d, { userMessage: "hi" })).rejects.toBeInstanceOf(UpstreamFailureError);
    expect(find).toHaveBeenCalledTimes(1);
    expect(client.requests).toHaveLength(2);
  });

  it("rejects a blank message", async () => {
    const client = new FakeCompletionClient([]);
    const { deps: d } = deps(client);
    await expect(handleHealthChat(d, { userMessage: "   " })).rejects.toThrow("userMessage must be a non-empty string.");
    expect(client.requests).toHaveLength(0);
  });
});
