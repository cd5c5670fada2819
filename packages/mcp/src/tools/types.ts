/**
 * Shared tool plumbing: result shape and argument narrowing.
 */

import {
  BUILTIN_TECHNOLOGIES,
  loadTechnology,
  ParameterError,
  parseTechnology,
  type TechnologyProfile,
} from "@capforge/core";
import { toCompact, toHostScript, type DrawPrimitive } from "@capforge/ir";

/** What every tool returns to the server. */
export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

export type PrimitiveFormat = "json" | "compact" | "script";

export function jsonResult(value: unknown): ToolResult {
  return { content: [{ type: "text", text: JSON.stringify(value, null, 2) }] };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Tool arguments as a record; a missing argument object counts as empty. */
export function toolArgs(input: unknown): Record<string, unknown> {
  if (input === undefined) return {};
  if (!isRecord(input)) throw new ParameterError("arguments must be an object", "<root>");
  return input;
}

export function optionalString(args: Record<string, unknown>, field: string): string | undefined {
  const value = args[field];
  if (value === undefined) return undefined;
  if (typeof value !== "string") throw new ParameterError("must be a string", field);
  return value;
}

export function optionalBoolean(args: Record<string, unknown>, field: string): boolean | undefined {
  const value = args[field];
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") throw new ParameterError("must be a boolean", field);
  return value;
}

/**
 * A technology argument: a built-in name, or an inline profile object.
 * Defaults to t28.
 */
export function readTechnology(args: Record<string, unknown>): TechnologyProfile {
  const value = args.technology;
  if (value === undefined) return loadTechnology("t28");
  if (typeof value === "string") {
    if (!BUILTIN_TECHNOLOGIES.some((name) => name === value)) {
      throw new ParameterError(
        `unknown technology ${value}; built-in: ${BUILTIN_TECHNOLOGIES.join(", ")}`,
        "technology",
      );
    }
    return loadTechnology(value);
  }
  return parseTechnology(value);
}

export function readFormat(args: Record<string, unknown>): PrimitiveFormat {
  const value = optionalString(args, "format") ?? "json";
  if (value !== "json" && value !== "compact" && value !== "script") {
    throw new ParameterError(`must be json, compact or script, got ${value}`, "format");
  }
  return value;
}

/** Primitives as structured JSON, compact text or a host script. */
export function formatPrimitives(
  primitives: readonly DrawPrimitive[],
  format: PrimitiveFormat,
  args: Record<string, unknown>,
): readonly DrawPrimitive[] | string {
  switch (format) {
    case "json":
      return primitives;
    case "compact":
      return toCompact(primitives);
    case "script":
      return toHostScript(primitives, {
        library: optionalString(args, "library") ?? "capforge",
        cell: optionalString(args, "cell") ?? "cap",
        masterLibrary: optionalString(args, "master_library"),
      });
  }
}

/** JSON Schema fragment for the technology argument. */
export const technologySchema = {
  description:
    `Technology: a built-in name (${BUILTIN_TECHNOLOGIES.join(", ")}) or an inline profile ` +
    "object with minSpacing, minWidth, viaPitch, viaMargin, widthQuantBase, widthQuantStep, " +
    "allowedLayers and layerNamingStyle. Defaults to t28.",
  oneOf: [
    { type: "string" as const, enum: [...BUILTIN_TECHNOLOGIES] },
    { type: "object" as const },
  ],
};

/** JSON Schema properties for output formatting arguments. */
export const formatSchema = {
  format: {
    type: "string" as const,
    enum: ["json", "compact", "script"],
    description: "Primitive output: structured JSON (default), compact text, or a host layout script",
  },
  library: { type: "string" as const, description: "Target library for script output" },
  cell: { type: "string" as const, description: "Target cell for script output" },
};
