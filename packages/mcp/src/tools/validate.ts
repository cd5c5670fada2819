/**
 * validate_capacitor tool: design-rule check without drawing.
 */

import { computeGeometry, parseShapeParameters, validate } from "@capforge/core";
import { geometrySummary } from "./compile.js";
import { shapeParametersSchema } from "./schema.js";
import { jsonResult, readTechnology, technologySchema, toolArgs, type ToolResult } from "./types.js";

export const validateCapacitorSchema = {
  type: "object" as const,
  properties: {
    technology: technologySchema,
    params: shapeParametersSchema,
  },
  required: ["params"],
};

export function validateCapacitor(input: unknown): ToolResult {
  const args = toolArgs(input);
  const tech = readTechnology(args);
  const params = parseShapeParameters(args.params);

  const geometry = computeGeometry(params, tech);
  const outcome = validate(geometry, params, tech);
  return jsonResult({
    ...outcome,
    geometry: geometrySummary(geometry),
  });
}
