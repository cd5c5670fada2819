/**
 * Narrowing of untrusted shape requests (CLI files, tool arguments).
 */

import { ParameterError } from "./errors.js";
import { isShapeKind } from "./shapes/index.js";
import type { ShapeParameters } from "./shapes/types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function num(obj: Record<string, unknown>, field: string): number {
  const value = obj[field];
  if (typeof value !== "number" || Number.isNaN(value)) {
    throw new ParameterError(value === undefined ? "is required" : "must be a number", field);
  }
  return value;
}

function optNum(obj: Record<string, unknown>, field: string): number | undefined {
  return obj[field] === undefined ? undefined : num(obj, field);
}

function optBool(obj: Record<string, unknown>, field: string): boolean | undefined {
  const value = obj[field];
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") throw new ParameterError("must be a boolean", field);
  return value;
}

/**
 * Build a {@link ShapeParameters} from untyped input. Only types are checked
 * here; dimensions are judged by the builder and the validator.
 *
 * @throws ParameterError naming the first bad field.
 */
export function parseShapeParameters(raw: unknown): ShapeParameters {
  if (!isRecord(raw)) {
    throw new ParameterError("parameters must be an object", "<root>");
  }
  const shape = raw.shape;
  if (typeof shape !== "string" || !isShapeKind(shape)) {
    throw new ParameterError(`must be "h", "i" or "sandwich", got ${JSON.stringify(shape)}`, "shape");
  }
  const layers = raw.layers;
  if (!Array.isArray(layers) || !layers.every((l): l is string => typeof l === "string")) {
    throw new ParameterError("must be an array of layer names, top first", "layers");
  }

  return {
    shape,
    fingerCount: num(raw, "fingerCount"),
    activeHeight: num(raw, "activeHeight"),
    fingerWidth: num(raw, "fingerWidth"),
    barWidth: num(raw, "barWidth"),
    frameWidth: num(raw, "frameWidth"),
    spacing: num(raw, "spacing"),
    layers: [...layers],
    maxHeight: optNum(raw, "maxHeight"),
    lowParasitic: optBool(raw, "lowParasitic"),
    shield: optBool(raw, "shield"),
    labelHeight: optNum(raw, "labelHeight"),
  };
}
