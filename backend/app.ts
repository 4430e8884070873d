import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import type { AppConfig } from "./config";
import type { CompletionClient } from "./ai/CompletionClient";
import { handleHealthChat } from "./ai/HealthChatHandler";
import { leadingSeverityTag } from "./ai/SystemInstruction";
import { ServiceUnavailableError } from "./errors";
import type { ToolRegistry } from "./maps/ToolRegistry";
import { errorHandler, notFoundHandler } from "./middleware/errorHandler";
import { privacyHeaders } from "./middleware/privacyHeaders";
import { parseChatRequest } from "./validation/schemas";

export interface AppDeps {
  readonly config: AppConfig;
  // null when the backend failed to initialize: /chat answers 503.
  readonly completionClient: CompletionClient | null;
  readonly toolRegistry: ToolRegistry;
}

// ---- Async error wrapper ----
function asyncHandler(fn: (req: Request, res: Response) => Promise<void>) {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };
}

export function createApp(deps: AppDeps): express.Express {
  const { config, completionClient, toolRegistry } = deps;
  const app = express();

  // ---- CORS ----
  app.use(cors({
    origin(requestOrigin: string | undefined, callback: (err: Error | null, allow?: boolean | string) => void) {
      // Same-origin page loads, curl and health pings send no Origin header
      if (!requestOrigin) return callback(null, true);
      if (config.corsOrigins.includes(requestOrigin)) return callback(null, requestOrigin);
      console.warn(`[CORS] Blocked request from origin: ${requestOrigin}`);
      callback(null, false);
    },
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type"],
  }));

  app.use(privacyHeaders);

  // ===============================
  // GET /api/health
  // ===============================
  app.get("/api/health", (_req, res) => {
    res.json({
      status: completionClient ? "ok" : "degraded",
      aiReady: completionClient !== null,
      model: config.geminiModel,
      timestamp: new Date().toISOString(),
    });
  });

  // ===============================
  // POST /chat
  // ===============================
  // Readiness is checked before the body is parsed: a degraded server answers 503 to any request.
  const requireCompletionClient = (_req: Request, _res: Response, next: NextFunction) => {
    next(completionClient ? undefined : new ServiceUnavailableError());
  };

  app.post("/chat", requireCompletionClient, express.json({ limit: "1mb" }), asyncHandler(async (req, res) => {
    if (!completionClient) throw new ServiceUnavailableError();

    const { message } = parseChatRequest(req.body, config.maxMessageLength);

    const reply = await handleHealthChat(
      { completionClient, toolRegistry, systemInstruction: config.systemInstruction },
      { userMessage: message },
    );

    if (!leadingSeverityTag(reply.response)) {
      console.warn("[Chat] Model response is missing a severity tag");
    }
    res.json(reply);
  }));

  // ---- Chat page ----
  app.use(express.static(config.publicDir));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
