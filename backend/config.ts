import { resolve as pathResolve } from "path";
import { TRIAGE_SYSTEM_INSTRUCTION } from "./ai/SystemInstruction";
import { MOCK_USER_LOCATION, type LatLng, type LocationFallbackPolicy } from "./domain/Location";

// Process-wide configuration.
// Built once at startup, frozen, and passed into the app; nothing reads process.env after this.

export type AppConfig = Readonly<{
  port: number;
  geminiApiKey: string;
  geminiModel: string;
  completionTimeoutMs: number;
  corsOrigins: readonly string[];
  publicDir: string;
  maxMessageLength: number;
  locationFallback: LocationFallbackPolicy;
  fallbackLocation: LatLng;
  systemInstruction: string;
}>;

export type Env = Readonly<Record<string, string | undefined>>;

const DEFAULT_ORIGINS = [
  "http://localhost:3000",
  "http://localhost:3001",
  "http://127.0.0.1:3001",
];

function envInt(env: Env, name: string, def: number): number {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return def;
  const v = Number(raw);
  return Number.isInteger(v) && v > 0 ? v : def;
}

function envList(env: Env, name: string, def: readonly string[]): readonly string[] {
  const raw = env[name];
  if (!raw || !raw.trim()) return def;
  return raw.split(",").map((s) => s.trim()).filter(Boolean);
}

function envLocationPolicy(env: Env): LocationFallbackPolicy {
  const v = (env.LOCATION_FALLBACK ?? "").toLowerCase().trim();
  return v === "reject" ? "reject" : "mock";
}

export function loadConfig(env: Env = process.env, cwd: string = process.cwd()): AppConfig {
  return Object.freeze({
    port: envInt(env, "PORT", 3001),
    geminiApiKey: (env.GEMINI_API_KEY ?? "").trim(),
    geminiModel: (env.GEMINI_MODEL ?? "").trim() || "gemini-2.5-flash",
    completionTimeoutMs: envInt(env, "COMPLETION_TIMEOUT_MS", 30_000),
    corsOrigins: Object.freeze([...envList(env, "CORS_ORIGINS", DEFAULT_ORIGINS)]),
    publicDir: pathResolve(cwd, (env.PUBLIC_DIR ?? "").trim() || "public"),
    maxMessageLength: envInt(env, "MAX_MESSAGE_LENGTH", 5000),
    locationFallback: envLocationPolicy(env),
    fallbackLocation: MOCK_USER_LOCATION,
    systemInstruction: TRIAGE_SYSTEM_INSTRUCTION,
  });
}
