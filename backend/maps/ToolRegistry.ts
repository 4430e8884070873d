import type { JsonValue } from "../domain/Json";
import type { ToolInvocationRequest, ToolResult } from "../domain/Conversation";
import type { LatLng, LocationFallbackPolicy } from "../domain/Location";
import { ToolArgumentError } from "../errors";
import { HospitalToolArgsSchema, describeIssues } from "../validation/schemas";
import { findNearestHospital, type LookupQuery } from "./HospitalFinder";

export const TOOL_NOT_FOUND = "Tool not found";

export const LOCATION_REQUIRED =
  "User location is required to search for nearby facilities.";

export type ToolDeclaration = Readonly<{
  name: string;
  description: string;
  // JSON Schema for the argument object.
  parameters: Readonly<Record<string, JsonValue>>;
}>;

export type RegisteredTool = Readonly<{
  declaration: ToolDeclaration;
  execute: (args: ToolInvocationRequest["arguments"]) => string | Promise<string>;
}>;

// Read-only after construction; safe to share across requests.
export class ToolRegistry {
  private readonly tools: ReadonlyMap<string, RegisteredTool>;

  constructor(tools: readonly RegisteredTool[]) {
    const byName = new Map<string, RegisteredTool>();
    for (const t of tools) {
      if (byName.has(t.declaration.name)) {
        throw new Error(`Duplicate tool name "${t.declaration.name}".`);
      }
      byName.set(t.declaration.name, t);
    }
    this.tools = byName;
  }

  declarations(): readonly ToolDeclaration[] {
    return [...this.tools.values()].map((t) => t.declaration);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  // Unknown names are answered to the model, not raised.
  async execute(call: ToolInvocationRequest): Promise<ToolResult> {
    const tool = this.tools.get(call.name);
    const content = tool ? await tool.execute(call.arguments) : TOOL_NOT_FOUND;
    return call.id === undefined
      ? { name: call.name, content }
      : { name: call.name, content, id: call.id };
  }
}

export const FIND_NEAREST_HOSPITAL = "find_nearest_hospital";

export const HOSPITAL_TOOL_DECLARATION: ToolDeclaration = {
  name: FIND_NEAREST_HOSPITAL,
  description:
    "Looks up hospitals near the user's location based on medical specialty and hospital type " +
    "(Government or Private). Returns a list of nearby hospitals and their details, including " +
    "price range and whether subsidized care is available.",
  parameters: {
    type: "object",
    properties: {
      specialty: { type: "string", description: "Medical specialty, e.g. pulmonology or cardiology." },
      type: { type: "string", description: "Hospital type: government or private." },
      user_location: {
        type: "object",
        description: "User coordinates. Leave empty when unknown.",
        properties: {
          lat: { type: "number" },
          lon: { type: "number" },
        },
        required: ["lat", "lon"],
      },
    },
    required: ["specialty", "type"],
  },
};

export type HospitalToolOptions = Readonly<{
  locationFallback: LocationFallbackPolicy;
  fallbackLocation: LatLng;
  find?: (query: LookupQuery) => string;
}>;

export function createHospitalTool(options: HospitalToolOptions): RegisteredTool {
  const find = options.find ?? findNearestHospital;

  return {
    declaration: HOSPITAL_TOOL_DECLARATION,
    execute(rawArgs) {
      const parsed = HospitalToolArgsSchema.safeParse(rawArgs);
      if (!parsed.success) {
        throw new ToolArgumentError(FIND_NEAREST_HOSPITAL, describeIssues(parsed.error));
      }
      const args = parsed.data;

      let location: LatLng;
      if (args.user_location) {
        location = { latitude: args.user_location.lat, longitude: args.user_location.lon };
      } else if (options.locationFallback === "mock") {
        location = options.fallbackLocation;
      } else {
        return LOCATION_REQUIRED;
      }

      return find({ specialty: args.specialty, facilityType: args.type, location });
    },
  };
}
