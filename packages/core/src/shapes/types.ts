/**
 * Type definitions shared by the shape builders.
 */

import type { DrawPrimitive, PathEnd, Point } from "@capforge/ir";
import type { TechnologyProfile } from "../technology.js";

/** Capacitor topologies. */
export type ShapeKind = "h" | "i" | "sandwich";

/** Parameters every shape takes. Lengths in µm. */
interface BaseShapeParameters {
  fingerCount: number;
  /** Height of the finger region between the frame gaps. */
  activeHeight: number;
  fingerWidth: number;
  /** Requested bar width; rounded up to the technology's quantized widths. */
  barWidth: number;
  frameWidth: number;
  /** Gap between fingers, between finger tips and bars, and around the active region. */
  spacing: number;
  /** Metal stack, top layer first. */
  layers: string[];
  /** Upper bound on the total height. */
  maxHeight?: number;
  /** Keep plates off the technology's low-parasitic excluded layers. */
  lowParasitic?: boolean;
  /** Draw the shield frame. Defaults per shape. */
  shield?: boolean;
  /** Pin label text height. */
  labelHeight?: number;
}

/** Frame, fingers and a middle bar. Odd finger count. */
export interface HShapeParameters extends BaseShapeParameters {
  shape: "h";
}

/** Fingers alternately hung from the top and bottom bars. Even finger count. */
export interface IShapeParameters extends BaseShapeParameters {
  shape: "i";
}

/** Solid plates above and below an interdigitated middle layer. */
export interface SandwichParameters extends BaseShapeParameters {
  shape: "sandwich";
}

export type ShapeParameters = HShapeParameters | IShapeParameters | SandwichParameters;

/** Capacitor terminals, plus the shield ring. */
export type Net = "TOP" | "BOT" | "SHIELD";

/** A centreline path drawn on every layer in `layers`. */
export interface PathFeature {
  kind: "path";
  name: string;
  net: Net;
  layers: readonly string[];
  /** Shield features disappear when the shield is not drawn. */
  shield: boolean;
  points: readonly Point[];
  width: number;
  end: PathEnd;
}

/** A solid rectangle (sandwich plates). */
export interface RectFeature {
  kind: "rect";
  name: string;
  net: Net;
  layers: readonly string[];
  shield: boolean;
  lowerLeft: Point;
  upperRight: Point;
}

export type Feature = PathFeature | RectFeature;

/** A named spacing or width, with the stricter minimum a shape may declare. */
export interface Measure {
  name: string;
  value: number;
  min?: number;
  /** Must be one of the technology's quantized widths. */
  quantized?: boolean;
}

/** One via row between two adjacent layers, centred on its bar. */
export interface ViaRow {
  name: string;
  lower: string;
  upper: string;
  origin: Point;
  rows: number;
  columns: number;
}

/** Where a terminal label goes. */
export interface Pin {
  net: "TOP" | "BOT";
  layer: string;
  point: Point;
}

/**
 * Everything a builder derives from a parameter set. Lower-left corner of the
 * frame at the origin; every number is on grid.
 */
export interface GeometryResult {
  readonly shape: ShapeKind;
  readonly fingerCount: number;
  readonly width: number;
  readonly totalHeight: number;
  readonly halfWidth: number;
  readonly halfHeight: number;
  readonly activeWidth: number;
  readonly activeHeight: number;
  /** Bar width after quantization. */
  readonly barWidth: number;
  readonly frameWidth: number;
  /** Metal stack, top layer first. */
  readonly layers: readonly string[];
  readonly spacings: readonly Measure[];
  readonly widths: readonly Measure[];
  readonly features: readonly Feature[];
  /** `[lower, upper]` pairs joined by vias. */
  readonly viaLayerPairs: readonly (readonly [string, string])[];
  readonly vias: readonly ViaRow[];
  readonly pins: readonly Pin[];
}

/** Numeric range for a parameter. */
export interface ParamRange {
  min: number;
  max: number;
  step?: number;
}

/** Parameter definition, used by the CLI help and the tool schemas. */
export type ParamDef =
  | { type: "number"; range: ParamRange; description: string }
  | { type: "integer"; range: ParamRange; description: string };

/** Parameter names with a numeric definition. */
export type NumericParam =
  | "fingerCount"
  | "activeHeight"
  | "fingerWidth"
  | "barWidth"
  | "frameWidth"
  | "spacing";

/** Source of uniform random numbers in [0, 1). */
export type Rng = () => number;

/** One capacitor topology. */
export interface ShapeBuilder<P extends ShapeParameters = ShapeParameters> {
  readonly kind: P["shape"];
  readonly description: string;
  /** Whether the shield frame is drawn when parameters do not say. */
  readonly defaultShield: boolean;

  paramDefs(tech: TechnologyProfile): Record<NumericParam, ParamDef>;

  /** A parameter set this builder accepts and the validator passes. */
  randomParams(tech: TechnologyProfile, rng?: Rng): P;

  /** `null` when the finger count suits this shape, else why not. */
  checkFingerCount(count: number): string | null;

  computeGeometry(params: P, tech: TechnologyProfile): GeometryResult;

  render(result: GeometryResult, params: P, includeShield: boolean): DrawPrimitive[];
}
