import type { NextFunction, Request, Response } from "express";
import { InvalidInputError, toHttpError } from "../errors";

// Single place where error bodies are written.
// Logs the internal detail; the client only receives the tagged public body.

type BodyParserError = Error & { readonly type: string; readonly status: number };

function isBodyParserError(err: unknown): err is BodyParserError {
  return (
    err instanceof Error &&
    "type" in err && typeof err.type === "string" &&
    "status" in err && typeof err.status === "number" &&
    err.status >= 400 && err.status < 500
  );
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const httpError = isBodyParserError(err) ? new InvalidInputError() : toHttpError(err);

  if (httpError.status >= 500) {
    const detail = err instanceof Error ? `${err.name}: ${err.message}` : String(err);
    console.error(`[Chat] ${req.method} ${req.path} failed:`, detail);
  }

  res.status(httpError.status).json(httpError.body());
}

export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({ error: "Not found" });
}
