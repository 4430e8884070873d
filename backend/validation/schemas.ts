import { z } from "zod";
import { InvalidInputError } from "../errors";

// Input validation schemas (Zod)
//
// Validates the chat payload and the arguments the model sends to tools
// before they reach domain logic.

export const ChatRequestSchema = z.object({
  message: z.string().trim().min(1),
});

export type ChatRequest = z.infer<typeof ChatRequestSchema>;

const ToolLocationSchema = z.object({
  lat: z.number().finite().min(-90).max(90),
  lon: z.number().finite().min(-180).max(180),
});

export const HospitalToolArgsSchema = z.object({
  specialty: z.string(),
  type: z.string(),
  user_location: ToolLocationSchema.nullable().optional(),
});

export function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}

// Any failure here is InvalidInput; the client only ever sees the fixed message.
export function parseChatRequest(body: unknown, maxMessageLength: number): ChatRequest {
  const parsed = ChatRequestSchema.safeParse(body ?? {});
  if (!parsed.success) throw new InvalidInputError();
  if (parsed.data.message.length > maxMessageLength) {
    throw new InvalidInputError(`Message must be ${maxMessageLength} characters or less`);
  }
  return parsed.data;
}
