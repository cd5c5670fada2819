/**
 * list_technologies tool: built-in profiles and the shapes they can build.
 */

import {
  BUILTIN_TECHNOLOGIES,
  loadTechnology,
  SHAPE_KINDS,
  shapeBuilders,
} from "@capforge/core";
import { jsonResult, readTechnology, toolArgs, type ToolResult } from "./types.js";

export const listTechnologiesSchema = {
  type: "object" as const,
  properties: {
    technology: {
      type: "string" as const,
      enum: [...BUILTIN_TECHNOLOGIES],
      description: "Only describe this technology, with parameter ranges for each shape",
    },
  },
};

export function listTechnologies(input: unknown): ToolResult {
  const args = toolArgs(input);

  if (args.technology === undefined) {
    return jsonResult({
      technologies: BUILTIN_TECHNOLOGIES.map((name) => loadTechnology(name)),
      shapes: SHAPE_KINDS.map((kind) => ({ kind, description: shapeBuilders[kind].description })),
    });
  }

  const tech = readTechnology(args);
  return jsonResult({
    technology: tech,
    shapes: SHAPE_KINDS.map((kind) => ({
      kind,
      description: shapeBuilders[kind].description,
      default_shield: shapeBuilders[kind].defaultShield,
      params: shapeBuilders[kind].paramDefs(tech),
    })),
  });
}
