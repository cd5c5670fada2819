/**
 * Design-rule checks on a computed geometry.
 *
 * Every check runs; the caller gets the complete list of violations to fix
 * before the next attempt.
 */

import { isOnGrid } from "@capforge/ir";
import { shapeBuilders } from "./shapes/index.js";
import type { Feature, GeometryResult, ShapeParameters } from "./shapes/types.js";
import type { TechnologyProfile } from "./technology.js";
import { isQuantized } from "./units.js";

export type ViolationCode =
  | "spacing-too-small"
  | "width-too-small"
  | "quantization-mismatch"
  | "layer-not-allowed"
  | "layers-not-adjacent"
  | "parity-violation"
  | "height-exceeds-ceiling"
  | "area-too-small";

export interface Violation {
  code: ViolationCode;
  /** What was measured: a measure, layer, layer pair or feature name. */
  subject: string;
  message: string;
  actual?: number | string;
  required?: number | string;
}

export type ValidationOutcome =
  | { status: "accepted" }
  | { status: "rejected"; violations: Violation[] };

/**
 * Check a geometry against the technology and the request that produced it.
 * `includeShield` says whether shield features will be drawn; it defaults to
 * `params.shield`, then the shape's default.
 */
export function validate(
  result: GeometryResult,
  params: ShapeParameters,
  tech: TechnologyProfile,
  includeShield: boolean = params.shield ?? shapeBuilders[result.shape].defaultShield,
): ValidationOutcome {
  const violations = [
    ...checkSpacings(result, tech),
    ...checkWidths(result, tech),
    ...checkQuantization(result, tech),
    ...checkLayers(result, params, tech),
    ...checkAdjacency(result, tech),
    ...checkParity(result),
    ...checkHeight(result, params),
    ...checkArea(result, tech, includeShield),
  ];
  return violations.length === 0 ? { status: "accepted" } : { status: "rejected", violations };
}

function checkSpacings(result: GeometryResult, tech: TechnologyProfile): Violation[] {
  const out: Violation[] = [];
  for (const m of result.spacings) {
    const required = Math.max(tech.minSpacing, m.min ?? 0);
    if (m.value < required) {
      out.push({
        code: "spacing-too-small",
        subject: m.name,
        message: `${m.name} spacing ${m.value} is below ${required}`,
        actual: m.value,
        required,
      });
    }
  }
  return out;
}

function checkWidths(result: GeometryResult, tech: TechnologyProfile): Violation[] {
  const out: Violation[] = [];
  for (const m of result.widths) {
    const required = Math.max(tech.minWidth, m.min ?? 0);
    if (m.value < required) {
      out.push({
        code: "width-too-small",
        subject: m.name,
        message: `${m.name} width ${m.value} is below ${required}`,
        actual: m.value,
        required,
      });
    }
  }
  return out;
}

function checkQuantization(result: GeometryResult, tech: TechnologyProfile): Violation[] {
  const out: Violation[] = [];
  for (const m of result.widths) {
    if (m.quantized && !isQuantized(m.value, tech)) {
      out.push({
        code: "quantization-mismatch",
        subject: m.name,
        message: `${m.name} width ${m.value} is not ${tech.widthQuantBase} + n × ${tech.widthQuantStep}`,
        actual: m.value,
      });
    }
  }
  for (const feature of result.features) {
    const offGrid = featureNumbers(feature).find((v) => !isOnGrid(v));
    if (offGrid !== undefined) {
      out.push({
        code: "quantization-mismatch",
        subject: feature.name,
        message: `${feature.name} has off-grid value ${offGrid}`,
        actual: offGrid,
      });
    }
  }
  return out;
}

function checkLayers(
  result: GeometryResult,
  params: ShapeParameters,
  tech: TechnologyProfile,
): Violation[] {
  const out: Violation[] = [];
  const excluded = params.lowParasitic ? (tech.lowParasiticExcludedLayers ?? []) : [];
  for (const layer of result.layers) {
    if (!tech.allowedLayers.includes(layer)) {
      out.push({
        code: "layer-not-allowed",
        subject: layer,
        message: `${layer} is not a layer of ${tech.name}`,
        actual: layer,
      });
    } else if (excluded.includes(layer)) {
      out.push({
        code: "layer-not-allowed",
        subject: layer,
        message: `${layer} is excluded in low-parasitic mode`,
        actual: layer,
      });
    }
  }
  return out;
}

function checkAdjacency(result: GeometryResult, tech: TechnologyProfile): Violation[] {
  const out: Violation[] = [];
  for (const [lower, upper] of result.viaLayerPairs) {
    const lo = tech.allowedLayers.indexOf(lower);
    const hi = tech.allowedLayers.indexOf(upper);
    // Layers outside the stack are already reported as illegal.
    if (lo < 0 || hi < 0) continue;
    if (hi - lo !== 1) {
      out.push({
        code: "layers-not-adjacent",
        subject: `${lower}-${upper}`,
        message: `vias cannot join ${lower} to ${upper}`,
        actual: hi - lo,
        required: 1,
      });
    }
  }
  return out;
}

function checkParity(result: GeometryResult): Violation[] {
  const problem = shapeBuilders[result.shape].checkFingerCount(result.fingerCount);
  if (problem === null) return [];
  return [
    {
      code: "parity-violation",
      subject: "fingerCount",
      message: problem,
      actual: result.fingerCount,
    },
  ];
}

function checkHeight(result: GeometryResult, params: ShapeParameters): Violation[] {
  if (params.maxHeight === undefined || result.totalHeight <= params.maxHeight) return [];
  return [
    {
      code: "height-exceeds-ceiling",
      subject: "totalHeight",
      message: `total height ${result.totalHeight} exceeds ${params.maxHeight}`,
      actual: result.totalHeight,
      required: params.maxHeight,
    },
  ];
}

function checkArea(
  result: GeometryResult,
  tech: TechnologyProfile,
  shieldDrawn: boolean,
): Violation[] {
  const minArea = tech.minArea;
  if (minArea === undefined || minArea === 0) return [];

  const out: Violation[] = [];
  for (const feature of result.features) {
    if (feature.shield && !shieldDrawn) continue;
    // Rounded to µm² × 1e-6 so products of grid values compare exactly.
    const area = Number(featureArea(feature).toFixed(6));
    if (area < minArea) {
      out.push({
        code: "area-too-small",
        subject: feature.name,
        message: `${feature.name} covers ${area} µm², below ${minArea}`,
        actual: area,
        required: minArea,
      });
    }
  }
  return out;
}

/** Drawn area of a feature on one layer. */
export function featureArea(feature: Feature): number {
  if (feature.kind === "rect") {
    return (
      (feature.upperRight.x - feature.lowerLeft.x) * (feature.upperRight.y - feature.lowerLeft.y)
    );
  }
  let length = 0;
  for (let i = 1; i < feature.points.length; i++) {
    const a = feature.points[i - 1];
    const b = feature.points[i];
    length += Math.hypot(b.x - a.x, b.y - a.y);
  }
  return feature.end === "extend"
    ? (length + feature.width) * feature.width
    : length * feature.width;
}

function featureNumbers(feature: Feature): number[] {
  if (feature.kind === "rect") {
    return [feature.lowerLeft.x, feature.lowerLeft.y, feature.upperRight.x, feature.upperRight.y];
  }
  return [feature.width, ...feature.points.flatMap((p) => [p.x, p.y])];
}
