// Error taxonomy for the chat relay.
// - Every error that reaches the client carries a fixed, tagged public message.
// - Internal detail (upstream messages, stack traces) is logged server-side only.

export const SERVICE_UNAVAILABLE_MESSAGE =
  "[ADVICE] The AI service is currently unavailable. Please check the API key configuration on the server.";

export const CRITICAL_ERROR_MESSAGE =
  "[ADVICE] A critical server error occurred while processing your request.";

export const NO_MESSAGE_PROVIDED = "No message provided";

export type HttpErrorBody =
  | { readonly error: string }
  | { readonly response: string };

export abstract class RelayError extends Error {
  abstract readonly status: number;
  abstract body(): HttpErrorBody;
}

export class InvalidInputError extends RelayError {
  readonly status = 400;

  constructor(readonly publicMessage: string = NO_MESSAGE_PROVIDED) {
    super(publicMessage);
    this.name = "InvalidInputError";
  }

  body(): HttpErrorBody {
    return { error: this.publicMessage };
  }
}

// Backend failed to initialize at startup (missing or rejected credential).
// Uses the `response` key so the chat page renders it like a model reply.
export class ServiceUnavailableError extends RelayError {
  readonly status = 503;

  constructor() {
    super("Completion backend is not initialized.");
    this.name = "ServiceUnavailableError";
  }

  body(): HttpErrorBody {
    return { response: SERVICE_UNAVAILABLE_MESSAGE };
  }
}

export class UpstreamFailureError extends RelayError {
  readonly status = 500;

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "UpstreamFailureError";
  }

  body(): HttpErrorBody {
    return { error: CRITICAL_ERROR_MESSAGE };
  }
}

export type CompletionFailureReason =
  | "auth_failed"
  | "throttled"
  | "transient_network"
  | "malformed_response"
  | "unknown";

// Raised by a CompletionClient for any backend failure. No retry policy here.
export class CompletionUnavailableError extends Error {
  constructor(
    message: string,
    readonly reason: CompletionFailureReason,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = "CompletionUnavailableError";
  }
}

// The model asked for a known tool with arguments we cannot use.
export class ToolArgumentError extends Error {
  constructor(readonly toolName: string, message: string) {
    super(`${toolName}: ${message}`);
    this.name = "ToolArgumentError";
  }
}

export function toHttpError(err: unknown): RelayError {
  if (err instanceof RelayError) return err;
  return new UpstreamFailureError(err instanceof Error ? err.message : String(err), err);
}
