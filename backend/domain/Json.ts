export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | { readonly [k: string]: JsonValue } | readonly JsonValue[];
export type JsonObject = { readonly [k: string]: JsonValue };

// Copies an untyped payload into a JsonValue, dropping anything JSON cannot carry.
export function toJsonValue(value: unknown): JsonValue {
  if (value === null || typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (Array.isArray(value)) return value.map(toJsonValue);
  if (typeof value === "object") return toJsonObject(value);
  return null;
}

export function toJsonObject(value: object): JsonObject {
  const out: Record<string, JsonValue> = {};
  for (const [k, v] of Object.entries(value)) {
    if (v === undefined || typeof v === "function") continue;
    out[k] = toJsonValue(v);
  }
  return out;
}
