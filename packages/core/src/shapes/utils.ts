/**
 * Helpers shared by the shape builders: dimension checks, feature
 * construction in grid units, via rows and random sampling.
 */

import { GRID_UNIT, isOnGrid, type Point } from "@capforge/ir";
import { GeometryError } from "../errors.js";
import type { TechnologyProfile } from "../technology.js";
import { fromUnits, quantizeWidth, toUnits, viaCount } from "../units.js";
import type {
  Measure,
  Net,
  ParamRange,
  PathFeature,
  Rng,
  ShapeParameters,
  ViaRow,
} from "./types.js";

// ============================================================================
// Dimensions
// ============================================================================

/** Parameter lengths in whole grid units, bar (and optionally frame) quantized. */
export interface Dimensions {
  n: number;
  /** Active height. */
  h: number;
  fingerWidth: number;
  barWidth: number;
  frameWidth: number;
  spacing: number;
}

function requireLength(value: number, field: string, evenUnits: boolean): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new GeometryError(`must be > 0, got ${value}`, "non-positive-span", field);
  }
  if (!isOnGrid(value)) {
    throw new GeometryError(`${value} is off grid`, "off-grid", field);
  }
  const units = toUnits(value);
  if (evenUnits && units % 2 !== 0) {
    throw new GeometryError(`${value} puts a path centreline off grid`, "off-grid", field);
  }
  return units;
}

/**
 * Check and convert the common parameters.
 *
 * @throws GeometryError on a non-positive or off-grid length.
 */
export function readDimensions(
  params: ShapeParameters,
  tech: TechnologyProfile,
  quantizeFrame: boolean,
): Dimensions {
  if (!Number.isFinite(params.barWidth) || params.barWidth <= 0) {
    throw new GeometryError(`must be > 0, got ${params.barWidth}`, "non-positive-span", "barWidth");
  }
  if (quantizeFrame && !(Number.isFinite(params.frameWidth) && params.frameWidth > 0)) {
    throw new GeometryError(`must be > 0, got ${params.frameWidth}`, "non-positive-span", "frameWidth");
  }

  return {
    n: params.fingerCount,
    h: requireLength(params.activeHeight, "activeHeight", false),
    fingerWidth: requireLength(params.fingerWidth, "fingerWidth", true),
    barWidth: toUnits(quantizeWidth(params.barWidth, tech)),
    frameWidth: quantizeFrame
      ? toUnits(quantizeWidth(params.frameWidth, tech))
      : requireLength(params.frameWidth, "frameWidth", true),
    spacing: requireLength(params.spacing, "spacing", false),
  };
}

/** Fail unless `span` (grid units) is positive. */
export function requireSpan(span: number, field: string, what: string): void {
  if (span <= 0) {
    throw new GeometryError(
      `${what} is ${fromUnits(span)}, must be > 0`,
      "non-positive-span",
      field,
    );
  }
}

/** The spacing and width measures every shape reports. */
export function standardMeasures(
  d: Dimensions,
  tech: TechnologyProfile,
  frameQuantized: boolean,
): { spacings: Measure[]; widths: Measure[] } {
  const s = fromUnits(d.spacing);
  return {
    spacings: [
      { name: "finger", value: s },
      { name: "fingerTip", value: s, min: tech.endOfLineSpacing },
      { name: "frame", value: s },
    ],
    widths: [
      { name: "finger", value: fromUnits(d.fingerWidth) },
      { name: "bar", value: fromUnits(d.barWidth), quantized: true },
      { name: "frame", value: fromUnits(d.frameWidth), quantized: frameQuantized },
    ],
  };
}

// ============================================================================
// Features (all coordinates in grid units)
// ============================================================================

export function pt(x: number, y: number): Point {
  return { x: fromUnits(x), y: fromUnits(y) };
}

export function hPath(
  name: string,
  net: Net,
  layers: readonly string[],
  x0: number,
  x1: number,
  y: number,
  width: number,
  shield = false,
): PathFeature {
  return {
    kind: "path",
    name,
    net,
    layers,
    shield,
    points: [pt(x0, y), pt(x1, y)],
    width: fromUnits(width),
    end: "truncate",
  };
}

export function vPath(
  name: string,
  net: Net,
  layers: readonly string[],
  x: number,
  y0: number,
  y1: number,
  width: number,
  shield = false,
): PathFeature {
  return {
    kind: "path",
    name,
    net,
    layers,
    shield,
    points: [pt(x, y0), pt(x, y1)],
    width: fromUnits(width),
    end: "truncate",
  };
}

/**
 * Closed ring of four paths around a `width` × `height` box. The horizontal
 * sides run the full width; the vertical sides stop at their inner edges.
 */
export function frameRing(
  prefix: string,
  net: Net,
  layers: readonly string[],
  width: number,
  height: number,
  frame: number,
  shield: boolean,
): PathFeature[] {
  const half = frame / 2;
  return [
    hPath(`${prefix}Bottom`, net, layers, 0, width, half, frame, shield),
    hPath(`${prefix}Top`, net, layers, 0, width, height - half, frame, shield),
    vPath(`${prefix}Left`, net, layers, half, frame, height - frame, frame, shield),
    vPath(`${prefix}Right`, net, layers, width - half, frame, height - frame, frame, shield),
  ];
}

// ============================================================================
// Vias
// ============================================================================

/** `[lower, upper]` for each consecutive pair of a top-first stack. */
export function adjacentPairs(layers: readonly string[]): Array<readonly [string, string]> {
  const pairs: Array<readonly [string, string]> = [];
  for (let i = 0; i + 1 < layers.length; i++) {
    pairs.push([layers[i + 1], layers[i]]);
  }
  return pairs;
}

/** Via row centred on a bar `height` thick and `length` long. */
export function viaRow(
  name: string,
  pair: readonly [string, string],
  x: number,
  y: number,
  height: number,
  length: number,
  tech: TechnologyProfile,
): ViaRow {
  return {
    name,
    lower: pair[0],
    upper: pair[1],
    origin: pt(x, y),
    rows: viaCount(fromUnits(height), tech),
    columns: viaCount(fromUnits(length), tech),
  };
}

// ============================================================================
// Random sampling
// ============================================================================

/** Random integer in `[min, max]`. */
export function randInt(min: number, max: number, rng: Rng): number {
  return min + Math.floor(rng() * (max - min + 1));
}

/** Random element of a non-empty array. */
export function randChoice<T>(choices: readonly T[], rng: Rng): T {
  return choices[Math.min(choices.length - 1, Math.floor(rng() * choices.length))];
}

/** Random value on a range's step grid, in grid units. */
export function randRangeUnits(range: ParamRange, rng: Rng): number {
  const min = toUnits(range.min);
  const step = toUnits(range.step ?? 0) || 1;
  const count = Math.floor((toUnits(range.max) - min) / step);
  return min + step * randInt(0, Math.max(0, count), rng);
}

/** Smallest even unit count not below `value` µm. */
export function evenUnitsAtLeast(value: number): number {
  const units = Math.ceil(value / GRID_UNIT - 1e-6);
  return units % 2 === 0 ? units : units + 1;
}

/** A contiguous run of `count` allowed layers, top first. */
export function randomLayerRun(tech: TechnologyProfile, count: number, rng: Rng): string[] {
  const allowed = tech.allowedLayers;
  const take = Math.min(count, allowed.length);
  const start = randInt(0, allowed.length - take, rng);
  return allowed.slice(start, start + take).reverse();
}

/**
 * Finger length (grid units) needed for a finger `fingerWidth` units wide to
 * clear the technology's minimum area, plus one unit of margin.
 */
export function minFingerLength(tech: TechnologyProfile, fingerWidth: number): number {
  if (tech.minArea === undefined || tech.minArea === 0) return 1;
  return Math.ceil(tech.minArea / fromUnits(fingerWidth) / GRID_UNIT) + 1;
}

/** Ranges shared by every shape, derived from the technology. */
export function commonParamDefs(tech: TechnologyProfile): {
  fingerWidth: ParamRange;
  spacing: ParamRange;
  barWidth: ParamRange;
  pathFrameWidth: ParamRange;
  quantizedFrameWidth: ParamRange;
  activeHeight: ParamRange;
} {
  const minWidth = fromUnits(evenUnitsAtLeast(tech.minWidth));
  const minSpacing = Math.max(tech.minSpacing, tech.endOfLineSpacing ?? 0);
  const quantTop = fromUnits(toUnits(tech.widthQuantBase) + 4 * toUnits(tech.widthQuantStep));
  return {
    fingerWidth: { min: minWidth, max: fromUnits(4 * toUnits(minWidth)), step: 2 * GRID_UNIT },
    spacing: { min: minSpacing, max: fromUnits(2 * toUnits(minSpacing)), step: GRID_UNIT },
    barWidth: { min: tech.widthQuantBase, max: quantTop, step: tech.widthQuantStep },
    pathFrameWidth: { min: minWidth, max: fromUnits(4 * toUnits(minWidth)), step: 2 * GRID_UNIT },
    quantizedFrameWidth: { min: tech.widthQuantBase, max: quantTop, step: tech.widthQuantStep },
    activeHeight: { min: fromUnits(8 * toUnits(tech.widthQuantBase)), max: 50, step: GRID_UNIT },
  };
}

/** Lengths drawn for {@link sampleCommon}, in µm. */
export interface CommonSample {
  activeHeight: number;
  fingerWidth: number;
  barWidth: number;
  frameWidth: number;
  spacing: number;
}

/**
 * Draw widths and spacing from the technology's ranges and an active height
 * tall enough for every finger segment to clear its span and area minima.
 */
export function sampleCommon(
  tech: TechnologyProfile,
  rng: Rng,
  quantizeFrame: boolean,
): CommonSample {
  const defs = commonParamDefs(tech);
  const fingerWidth = randRangeUnits(defs.fingerWidth, rng);
  const spacing = randRangeUnits(defs.spacing, rng);
  const barWidth = randRangeUnits(defs.barWidth, rng);
  const frameWidth = randRangeUnits(
    quantizeFrame ? defs.quantizedFrameWidth : defs.pathFrameWidth,
    rng,
  );

  const half = Math.ceil((3 * barWidth) / 2) + spacing + minFingerLength(tech, fingerWidth) + 1;
  const minHeight = 2 * half;
  const activeHeight = randInt(minHeight, minHeight + 200, rng);

  return {
    activeHeight: fromUnits(activeHeight),
    fingerWidth: fromUnits(fingerWidth),
    barWidth: fromUnits(barWidth),
    frameWidth: fromUnits(frameWidth),
    spacing: fromUnits(spacing),
  };
}

/** Deterministic generator (mulberry32) for reproducible samples. */
export function seededRng(seed: number): Rng {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
