/**
 * H capacitor - framed fingers around a middle bar.
 *
 * Top and bottom bars (TOP) are joined by the two outer fingers. Inner even
 * fingers hang from the top bar and rise from the bottom bar, stopping short
 * of the middle bar; odd fingers (BOT) cross the middle bar and stop short of
 * the outer bars.
 */

import type { DrawPrimitive } from "@capforge/ir";
import { GeometryError } from "../errors.js";
import { render } from "../render.js";
import type { TechnologyProfile } from "../technology.js";
import { fromUnits } from "../units.js";
import type {
  Feature,
  GeometryResult,
  HShapeParameters,
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

export class HShapeBuilder implements ShapeBuilder<HShapeParameters> {
  readonly kind = "h";
  readonly description = "Shielded frame with interleaved fingers and a middle bar";
  readonly defaultShield = true;

  paramDefs(tech: TechnologyProfile): Record<NumericParam, ParamDef> {
    const common = commonParamDefs(tech);
    return {
      fingerCount: {
        type: "integer",
        range: { min: 3, max: 31, step: 2 },
        description: "Number of fingers (odd)",
      },
      activeHeight: {
        type: "number",
        range: common.activeHeight,
        description: "Height of the finger region (µm)",
      },
      fingerWidth: {
        type: "number",
        range: common.fingerWidth,
        description: "Finger width (µm)",
      },
      barWidth: {
        type: "number",
        range: common.barWidth,
        description: "Bar width, rounded up to a quantized width (µm)",
      },
      frameWidth: {
        type: "number",
        range: common.pathFrameWidth,
        description: "Shield frame width (µm)",
      },
      spacing: {
        type: "number",
        range: common.spacing,
        description: "Finger, tip and frame spacing (µm)",
      },
    };
  }

  randomParams(tech: TechnologyProfile, rng: Rng = Math.random): HShapeParameters {
    const count = this.paramDefs(tech).fingerCount.range;
    const steps = (count.max - count.min) / 2;
    return {
      shape: "h",
      fingerCount: count.min + 2 * randInt(0, steps, rng),
      ...sampleCommon(tech, rng, false),
      layers: randomLayerRun(tech, randInt(2, 5, rng), rng),
    };
  }

  checkFingerCount(count: number): string | null {
    if (!Number.isInteger(count) || count < 3 || count % 2 === 0) {
      return `H shape needs an odd finger count >= 3, got ${count}`;
    }
    return null;
  }

  computeGeometry(params: HShapeParameters, tech: TechnologyProfile): GeometryResult {
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
    const ym = y0 + Math.floor(h / 2);
    const xm = x0 + Math.floor(activeWidth / 2);

    // Odd fingers must clear the middle bar before stopping short of the outer bars.
    requireSpan(Math.floor(h / 2) - (3 * bw) / 2 - s, "activeHeight", "odd finger overlap past the middle bar");

    const fingerX = (i: number): number => x0 + fw / 2 + i * (fw + s);
    const features: Feature[] = [
      hPath("topBar", "TOP", layers, x0, x1, y1 - bw / 2, bw),
      hPath("bottomBar", "TOP", layers, x0, x1, y0 + bw / 2, bw),
      hPath("middleBar", "BOT", layers, x0 + fw + s, x1 - fw - s, ym, bw),
    ];

    for (let i = 0; i < n; i++) {
      const x = fingerX(i);
      if (i === 0 || i === n - 1) {
        features.push(vPath(`finger${i}`, "TOP", layers, x, y0, y1, fw));
      } else if (i % 2 === 0) {
        features.push(vPath(`finger${i}Lower`, "TOP", layers, x, y0, ym - bw / 2 - s, fw));
        features.push(vPath(`finger${i}Upper`, "TOP", layers, x, ym + bw / 2 + s, y1, fw));
      } else {
        features.push(vPath(`finger${i}`, "BOT", layers, x, y0 + bw + s, y1 - bw - s, fw));
      }
    }

    features.push(...frameRing("shield", "SHIELD", layers, width, height, fr, true));

    const viaLayerPairs = adjacentPairs(layers);
    const vias: ViaRow[] = [];
    for (const pair of viaLayerPairs) {
      vias.push(viaRow("top", pair, xm, y1 - bw / 2, bw, activeWidth, tech));
      vias.push(viaRow("middle", pair, xm, ym, bw, activeWidth - 2 * (fw + s), tech));
      vias.push(viaRow("bottom", pair, xm, y0 + bw / 2, bw, activeWidth, tech));
    }

    return {
      shape: "h",
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
        { net: "BOT", layer: layers[0], point: pt(xm, ym) },
      ],
    };
  }

  render(result: GeometryResult, params: HShapeParameters, includeShield: boolean): DrawPrimitive[] {
    return render(result, params, includeShield);
  }
}
