/**
 * Sandwich capacitor - solid TOP plates on the outer layers of a three-layer
 * stack around an interdigitated middle layer.
 *
 * The middle layer carries a TOP frame ring whose fingers reach into the
 * notches of a BOT core (a middle bar plus full-height core fingers). Vias
 * join the frame to the bottom plate only.
 */

import type { DrawPrimitive } from "@capforge/ir";
import { GeometryError } from "../errors.js";
import { render } from "../render.js";
import type { TechnologyProfile } from "../technology.js";
import { fromUnits } from "../units.js";
import type {
  Feature,
  GeometryResult,
  NumericParam,
  ParamDef,
  Rng,
  SandwichParameters,
  ShapeBuilder,
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

export class SandwichBuilder implements ShapeBuilder<SandwichParameters> {
  readonly kind = "sandwich";
  readonly description = "Tri-layer sandwich: plates above and below a notched core";
  readonly defaultShield = false;

  paramDefs(tech: TechnologyProfile): Record<NumericParam, ParamDef> {
    const common = commonParamDefs(tech);
    return {
      fingerCount: {
        type: "integer",
        range: { min: 2, max: 16, step: 1 },
        description: "Number of core fingers",
      },
      activeHeight: { type: "number", range: common.activeHeight, description: "Height of the core (µm)" },
      fingerWidth: { type: "number", range: common.fingerWidth, description: "Finger width (µm)" },
      barWidth: {
        type: "number",
        range: common.barWidth,
        description: "Core bar width, rounded up to a quantized width (µm)",
      },
      frameWidth: {
        type: "number",
        range: common.quantizedFrameWidth,
        description: "Frame ring width, rounded up to a quantized width (µm)",
      },
      spacing: { type: "number", range: common.spacing, description: "Core to frame spacing (µm)" },
    };
  }

  randomParams(tech: TechnologyProfile, rng: Rng = Math.random): SandwichParameters {
    const count = this.paramDefs(tech).fingerCount.range;
    return {
      shape: "sandwich",
      fingerCount: randInt(count.min, count.max, rng),
      ...sampleCommon(tech, rng, true),
      layers: randomLayerRun(tech, 3, rng),
    };
  }

  checkFingerCount(count: number): string | null {
    if (!Number.isInteger(count) || count < 2) {
      return `sandwich needs at least 2 core fingers, got ${count}`;
    }
    return null;
  }

  computeGeometry(params: SandwichParameters, tech: TechnologyProfile): GeometryResult {
    const parity = this.checkFingerCount(params.fingerCount);
    if (parity) throw new GeometryError(parity, "parity-violation", "fingerCount");
    if (params.layers.length !== 3) {
      throw new GeometryError(
        `needs exactly 3 layers, got ${params.layers.length}`,
        "layer-count",
        "layers",
      );
    }

    const d = readDimensions(params, tech, true);
    const { n, h, fingerWidth: fw, barWidth: bw, frameWidth: fr, spacing: s } = d;
    const layers = [...params.layers];
    const [top, middle, bottom] = layers;

    const activeWidth = (2 * n - 1) * fw + (2 * n - 2) * s;
    const x0 = fr + s;
    const y0 = fr + s;
    const x1 = x0 + activeWidth;
    const y1 = y0 + h;
    const width = activeWidth + 2 * s + 2 * fr;
    const height = h + 2 * s + 2 * fr;
    const ym = y0 + Math.floor(h / 2);
    const xm = x0 + Math.floor(activeWidth / 2);

    requireSpan(Math.floor(h / 2) - bw / 2 - s, "activeHeight", "frame finger reach into the core");

    const pitch = fw + s;
    const features: Feature[] = [
      {
        kind: "rect",
        name: "topPlate",
        net: "TOP",
        layers: [top],
        shield: false,
        lowerLeft: pt(0, 0),
        upperRight: pt(width, height),
      },
      {
        kind: "rect",
        name: "bottomPlate",
        net: "TOP",
        layers: [bottom],
        shield: false,
        lowerLeft: pt(0, 0),
        upperRight: pt(width, height),
      },
      hPath("coreBar", "BOT", [middle], x0, x1, ym, bw),
    ];
    for (let j = 0; j < n; j++) {
      features.push(vPath(`core${j}`, "BOT", [middle], x0 + fw / 2 + 2 * j * pitch, y0, y1, fw));
    }

    features.push(...frameRing("frame", "TOP", [middle], width, height, fr, false));
    for (let j = 0; j + 1 < n; j++) {
      const x = x0 + fw / 2 + (2 * j + 1) * pitch;
      features.push(vPath(`frameFinger${j}Upper`, "TOP", [middle], x, ym + bw / 2 + s, height - fr / 2, fw));
      features.push(vPath(`frameFinger${j}Lower`, "TOP", [middle], x, fr / 2, ym - bw / 2 - s, fw));
    }

    // Only the bottom plate is strapped to the frame.
    const pair = adjacentPairs(layers)[1];
    const xc = Math.floor(width / 2);

    return {
      shape: "sandwich",
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
      ...standardMeasures(d, tech, true),
      features,
      viaLayerPairs: [pair],
      vias: [
        viaRow("frameTop", pair, xc, height - fr / 2, fr, width, tech),
        viaRow("frameBottom", pair, xc, fr / 2, fr, width, tech),
      ],
      pins: [
        { net: "TOP", layer: top, point: pt(xc, Math.floor(height / 2)) },
        { net: "BOT", layer: middle, point: pt(xm, ym) },
      ],
    };
  }

  render(result: GeometryResult, params: SandwichParameters, includeShield: boolean): DrawPrimitive[] {
    return render(result, params, includeShield);
  }
}
