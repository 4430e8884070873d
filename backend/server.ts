import dotenv from "dotenv";
import { existsSync } from "fs";
import { resolve as pathResolve } from "path";
import { createApp } from "./app";
import { loadConfig, type AppConfig } from "./config";
import type { CompletionClient } from "./ai/CompletionClient";
import { GeminiCompletionClient } from "./ai/GeminiCompletionClient";
import { ToolRegistry, createHospitalTool } from "./maps/ToolRegistry";

// Load .env before loadConfig() reads process.env.
const envPath = pathResolve(process.cwd(), ".env");
if (existsSync(envPath)) {
  dotenv.config({ path: envPath });
}

function initCompletionClient(config: AppConfig): CompletionClient | null {
  if (!config.geminiApiKey) {
    console.error("[TriageRelay] AI Initialization Error: GEMINI_API_KEY is not set");
    return null;
  }
  try {
    return new GeminiCompletionClient({
      apiKey: config.geminiApiKey,
      model: config.geminiModel,
      timeoutMs: config.completionTimeoutMs,
    });
  } catch (err) {
    console.error("[TriageRelay] AI Initialization Error:", err instanceof Error ? err.message : String(err));
    return null;
  }
}

const config = loadConfig();
const completionClient = initCompletionClient(config);
const toolRegistry = new ToolRegistry([
  createHospitalTool({
    locationFallback: config.locationFallback,
    fallbackLocation: config.fallbackLocation,
  }),
]);

const app = createApp({ config, completionClient, toolRegistry });

const server = app.listen(config.port, "0.0.0.0", () => {
  console.log(`[TriageRelay] Server running on port ${config.port}`);
  console.log(`[TriageRelay] Model: ${config.geminiModel}`);
  console.log(`[TriageRelay] AI: ${completionClient ? `ready (${completionClient.name})` : "UNAVAILABLE (degraded mode, /chat returns 503)"}`);
  console.log(`[TriageRelay] Location fallback: ${config.locationFallback}`);
  console.log(`[TriageRelay] CORS allowed origins: ${config.corsOrigins.join(", ")}`);
});

// ---- Graceful shutdown ----
function shutdown(signal: string): void {
  console.log(`[TriageRelay] ${signal} received — shutting down gracefully`);
  server.close((err) => {
    if (err) console.error("[TriageRelay] Error while closing server:", err.message);
    process.exit(err ? 1 : 0);
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
