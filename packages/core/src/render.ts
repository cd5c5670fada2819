/**
 * Geometry → drawing primitives.
 */

import { snap, snapPoint, viaDefName, type DrawPrimitive } from "@capforge/ir";
import type { Feature, GeometryResult, ShapeParameters } from "./shapes/types.js";

/** Pin label text height when the parameters leave it out. */
export const DEFAULT_LABEL_HEIGHT = 0.1;

/**
 * Flatten a geometry into primitives.
 *
 * Layers are walked bottom to top: the metal of a layer, then the vias up to
 * the next one. Pin labels come last. With `includeShield` off only the
 * shield frame is dropped; every other primitive is identical.
 */
export function render(
  result: GeometryResult,
  params: ShapeParameters,
  includeShield: boolean,
): DrawPrimitive[] {
  const out: DrawPrimitive[] = [];

  for (const layer of [...result.layers].reverse()) {
    for (const feature of result.features) {
      if (!feature.layers.includes(layer)) continue;
      if (feature.shield && !includeShield) continue;
      out.push(drawFeature(feature, layer));
    }
    for (const via of result.vias) {
      if (via.lower !== layer) continue;
      out.push({
        kind: "Via",
        viaDef: viaDefName(via.lower, via.upper),
        origin: snapPoint(via.origin),
        rows: via.rows,
        columns: via.columns,
      });
    }
  }

  const height = snap(params.labelHeight ?? DEFAULT_LABEL_HEIGHT);
  for (const pin of result.pins) {
    out.push({
      kind: "Label",
      layer: pin.layer,
      origin: snapPoint(pin.point),
      text: pin.net,
      justify: "centerCenter",
      orientation: "R0",
      height,
    });
  }

  return out;
}

function drawFeature(feature: Feature, layer: string): DrawPrimitive {
  switch (feature.kind) {
    case "path":
      return {
        kind: "Path",
        layer,
        points: feature.points.map(snapPoint),
        width: snap(feature.width),
        end: feature.end,
      };
    case "rect":
      return {
        kind: "Rect",
        layer,
        lowerLeft: snapPoint(feature.lowerLeft),
        upperRight: snapPoint(feature.upperRight),
      };
  }
}
