/**
 * compile_capacitor tool: parameters in, primitives or violations out.
 */

import { compileCapacitor as compile, parseShapeParameters, type GeometryResult } from "@capforge/core";
import { shapeParametersSchema } from "./schema.js";
import {
  formatPrimitives,
  formatSchema,
  jsonResult,
  optionalBoolean,
  readFormat,
  readTechnology,
  technologySchema,
  toolArgs,
  type ToolResult,
} from "./types.js";

export const compileCapacitorSchema = {
  type: "object" as const,
  properties: {
    technology: technologySchema,
    params: shapeParametersSchema,
    include_shield: {
      type: "boolean" as const,
      description: "Override the shield setting of params",
    },
    ...formatSchema,
  },
  required: ["params"],
};

/** The dimensions a caller needs to place the cell. */
export function geometrySummary(geometry: GeometryResult): Record<string, unknown> {
  return {
    shape: geometry.shape,
    width: geometry.width,
    total_height: geometry.totalHeight,
    active_width: geometry.activeWidth,
    active_height: geometry.activeHeight,
    bar_width: geometry.barWidth,
    frame_width: geometry.frameWidth,
    layers: geometry.layers,
    pins: geometry.pins,
  };
}

export function compileCapacitor(input: unknown): ToolResult {
  const args = toolArgs(input);
  const tech = readTechnology(args);
  const params = parseShapeParameters(args.params);
  const format = readFormat(args);

  const result = compile(params, tech, { includeShield: optionalBoolean(args, "include_shield") });
  if (result.status === "rejected") {
    return jsonResult({
      status: "rejected",
      geometry: geometrySummary(result.geometry),
      violations: result.violations,
    });
  }

  return jsonResult({
    status: "accepted",
    geometry: geometrySummary(result.geometry),
    primitive_count: result.primitives.length,
    primitives: formatPrimitives(result.primitives, format, args),
  });
}
