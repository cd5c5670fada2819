/**
 * Build, check and draw one capacitor.
 */

import type { DrawPrimitive } from "@capforge/ir";
import { computeGeometry, shapeBuilders } from "./shapes/index.js";
import type { GeometryResult, ShapeParameters } from "./shapes/types.js";
import type { TechnologyProfile } from "./technology.js";
import { validate, type Violation } from "./validate.js";

export interface CompileOptions {
  /** Overrides `params.shield` and the shape's default. */
  includeShield?: boolean;
}

export type CompileResult =
  | { status: "accepted"; geometry: GeometryResult; primitives: DrawPrimitive[] }
  | { status: "rejected"; geometry: GeometryResult; violations: Violation[] };

/**
 * Geometry → validation → primitives. Primitives are only drawn for an
 * accepted geometry.
 *
 * @throws GeometryError when the shape cannot be built at all.
 */
export function compileCapacitor(
  params: ShapeParameters,
  tech: TechnologyProfile,
  options: CompileOptions = {},
): CompileResult {
  const builder = shapeBuilders[params.shape];
  const geometry = computeGeometry(params, tech);
  const includeShield = options.includeShield ?? params.shield ?? builder.defaultShield;
  const outcome = validate(geometry, params, tech, includeShield);
  if (outcome.status === "rejected") {
    return { status: "rejected", geometry, violations: outcome.violations };
  }

  return { status: "accepted", geometry, primitives: builder.render(geometry, params, includeShield) };
}
