/**
 * merge_array tool: compress an array occupancy grid into mosaic placements.
 */

import { assembleArray, parseArrayGrid } from "@capforge/core";
import {
  formatPrimitives,
  formatSchema,
  jsonResult,
  optionalString,
  readFormat,
  toolArgs,
  type ToolResult,
} from "./types.js";

export const mergeArraySchema = {
  type: "object" as const,
  properties: {
    grid: {
      type: "object" as const,
      description: "Array of unit-cell positions. Row 0 is the bottom row.",
      properties: {
        occupancy: {
          type: "array" as const,
          description: "Rows of booleans, or strings of '#' (occupied) and '.' (empty)",
        },
        pitch: {
          type: "object" as const,
          description: "Column pitch x and row pitch y (µm)",
          properties: { x: { type: "number" as const }, y: { type: "number" as const } },
        },
        origin: {
          type: "object" as const,
          description: "Lower-left corner of cell (0, 0); defaults to (0, 0)",
          properties: { x: { type: "number" as const }, y: { type: "number" as const } },
        },
        masters: {
          type: "array" as const,
          description: "Optional per-cell master names (e.g. unit vs. dummy); null uses default_master",
        },
      },
      required: ["occupancy", "pitch"],
    },
    default_master: {
      type: "string" as const,
      description: "Master for cells without a name (default: unit)",
    },
    master_library: { type: "string" as const, description: "Library of the masters for script output" },
    ...formatSchema,
  },
  required: ["grid"],
};

export function mergeArray(input: unknown): ToolResult {
  const args = toolArgs(input);
  const grid = parseArrayGrid(args.grid);
  const format = readFormat(args);

  const { regions, primitives } = assembleArray(grid, optionalString(args, "default_master"));
  return jsonResult({
    region_count: regions.length,
    regions,
    placements: formatPrimitives(primitives, format, args),
  });
}
