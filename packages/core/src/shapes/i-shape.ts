/**
 * I capacitor - fingers alternately hung from a TOP bar and a BOT bar.
 */

import type { DrawPrimitive } from "@capforge/ir";
import { GeometryError } from "../errors.js";
import { render } from "../render.js";
import type { TechnologyProfile } from "../technology.js";
import { fromUnits } from "../units.js";
import type {
  Feature,
  GeometryResult,
  IShapeParameters,
  NumericParam,
  ParamDef,
  Rng,
  ShapeBuilder,
  ViaRow,
} from "./types.js";
import {
  adjacentPairs,
  commonParamDefs,
  frameRing,
  hPath,
  pt,
  randInt,
  randomLayerRun,
  readDimensions,
  requireSpan,
  sampleCommon,
  standardMeasures,
  viaRow,
  vPath,
} from "./utils.js";

export class IShapeBuilder implements ShapeBuilder<IShapeParameters> {
  readonly kind = "i";
  readonly description = "Interdigitated fingers between two bars, no middle bar";
  readonly defaultShield = false;

  paramDefs(tech: TechnologyProfile): Record<NumericParam, ParamDef> {
    const common = commonParamDefs(tech);
    return {
      fingerCount: {
        type: "integer",
        range: { min: 2, max: 32, step: 2 },
        description: "Number of fingers (even)",
      },
      activeHeight: {
        type: "number",
        range: common.activeHeight,
        description: "Height of the finger region (µm)",
      },
      fingerWidth: { type: "number", range: common.fingerWidth, description: "Finger width (µm)" },
      barWidth: {
        type: "number",
        range: common.barWidth,
        description: "Bar width, rounded up to a quantized width (µm)",
      },
      frameWidth: { type: "number", range: common.pathFrameWidth, description: "Shield frame width (µm)" },
      spacing: { type: "number", range: common.spacing, description: "Finger, tip and frame spacing (µm)" },
    };
  }

  randomParams(tech: TechnologyProfile, rng: Rng = Math.random): IShapeParameters {
    const count = this.paramDefs(tech).fingerCount.range;
    return {
      shape: "i",
      fingerCount: count.min + 2 * randInt(0, (count.max - count.min) / 2, rng),
      ...sampleCommon(tech, rng, false),
      layers: randomLayerRun(tech, randInt(2, 5, rng), rng),
    };
  }

  checkFingerCount(count: number): string | null {
    if (!Number.isInteger(count) || count < 2 || count % 2 !== 0) {
      return `I shape needs an even finger count >= 2, got ${count}`;
    }
    return null;
  }

  computeGeometry(params: IShapeParameters, tech: TechnologyProfile): GeometryResult {
    const parity = this.checkFingerCount(params.fingerCount);
    if (parity) throw new GeometryError(parity, "parity-violation", "fingerCount");
    if (params.layers.length === 0) {
      throw new GeometryError("needs at least one layer", "layer-count", "layers");
    }

    const d = readDimensions(params, tech, false);
    const { n, h, fingerWidth: fw, barWidth: bw, frameWidth: fr, spacing: s } = d;
    const layers = [...params.layers];

    const activeWidth = n * fw + (n - 1) * s;
    const x0 = fr + s;
    const y0 = fr + s;
    const x1 = x0 + activeWidth;
    const y1 = y0 + h;
    const width = activeWidth + 2 * s + 2 * fr;
    const height = h + 2 * s + 2 * fr;
    const xm = x0 + Math.floor(activeWidth / 2);

    requireSpan(h - 2 * bw - s, "activeHeight", "finger overlap");

    const features: Feature[] = [
      hPath("topBar", "TOP", layers, x0, x1, y1 - bw / 2, bw),
      hPath("bottomBar", "BOT", layers, x0, x1, y0 + bw / 2, bw),
    ];
    for (let i = 0; i < n; i++) {
      const x = x0 + fw / 2 + i * (fw + s);
      features.push(
        i % 2 === 0
          ? vPath(`finger${i}`, "TOP", layers, x, y0 + bw + s, y1, fw)
          : vPath(`finger${i}`, "BOT", layers, x, y0, y1 - bw - s, fw),
      );
    }
    features.push(...frameRing("shield", "SHIELD", layers, width, height, fr, true));

    const viaLayerPairs = adjacentPairs(layers);
    const vias: ViaRow[] = [];
    for (const pair of viaLayerPairs) {
      vias.push(viaRow("top", pair, xm, y1 - bw / 2, bw, activeWidth, tech));
      vias.push(viaRow("bottom", pair, xm, y0 + bw / 2, bw, activeWidth, tech));
    }

    return {
      shape: "i",
      fingerCount: n,
      width: fromUnits(width),
      totalHeight: fromUnits(height),
      halfWidth: fromUnits(Math.round(width / 2)),
      halfHeight: fromUnits(Math.round(height / 2)),
      activeWidth: fromUnits(activeWidth),
      activeHeight: fromUnits(h),
      barWidth: fromUnits(bw),
      frameWidth: fromUnits(fr),
      layers,
      ...standardMeasures(d, tech, false),
      features,
      viaLayerPairs,
      vias,
      pins: [
        { net: "TOP", layer: layers[0], point: pt(xm, y1 - bw / 2) },
        { net: "BOT", layer: layers[0], point: pt(xm, y0 + bw / 2) },
      ],
    };
  }

  render(result: GeometryResult, params: IShapeParameters, includeShield: boolean): DrawPrimitive[] {
    return render(result, params, includeShield);
  }
}
