/**
 * Shape builder registry.
 */

export type {
  ShapeKind,
  ShapeParameters,
  HShapeParameters,
  IShapeParameters,
  SandwichParameters,
  Net,
  PathFeature,
  RectFeature,
  Feature,
  Measure,
  ViaRow,
  Pin,
  GeometryResult,
  ParamRange,
  ParamDef,
  NumericParam,
  Rng,
  ShapeBuilder,
} from "./types.js";

export { HShapeBuilder } from "./h-shape.js";
export { IShapeBuilder } from "./i-shape.js";
export { SandwichBuilder } from "./sandwich.js";
export { seededRng } from "./utils.js";

import type { TechnologyProfile } from "../technology.js";
import { HShapeBuilder } from "./h-shape.js";
import { IShapeBuilder } from "./i-shape.js";
import { SandwichBuilder } from "./sandwich.js";
import type { GeometryResult, ShapeBuilder, ShapeKind, ShapeParameters } from "./types.js";

const hShape = new HShapeBuilder();
const iShape = new IShapeBuilder();
const sandwich = new SandwichBuilder();

/** Registry of all shape builders. */
export const shapeBuilders: Record<ShapeKind, ShapeBuilder> = {
  h: hShape,
  i: iShape,
  sandwich,
};

/** All shape kinds, in registry order. */
export const SHAPE_KINDS = Object.keys(shapeBuilders).filter(isShapeKind);

export function isShapeKind(value: string): value is ShapeKind {
  return value === "h" || value === "i" || value === "sandwich";
}

/**
 * Derive the full geometry of a capacitor.
 *
 * @throws GeometryError when the parameters describe an impossible structure.
 */
export function computeGeometry(params: ShapeParameters, tech: TechnologyProfile): GeometryResult {
  switch (params.shape) {
    case "h":
      return hShape.computeGeometry(params, tech);
    case "i":
      return iShape.computeGeometry(params, tech);
    case "sandwich":
      return sandwich.computeGeometry(params, tech);
  }
}
