import type {
  HShapeParameters,
  IShapeParameters,
  SandwichParameters,
} from "../shapes/types.js";
import { loadTechnology } from "../technology.js";

export const t28 = loadTechnology("t28");
export const t180 = loadTechnology("t180");

/** Five-finger H capacitor on M7..M3, drawn 0.89 × 1.86 µm. */
export const hExample: HShapeParameters = {
  shape: "h",
  fingerCount: 5,
  activeHeight: 1.5,
  fingerWidth: 0.05,
  barWidth: 0.38,
  frameWidth: 0.11,
  spacing: 0.07,
  layers: ["M7", "M6", "M5", "M4", "M3"],
};

export const iExample: IShapeParameters = {
  shape: "i",
  fingerCount: 4,
  activeHeight: 1.5,
  fingerWidth: 0.05,
  barWidth: 0.38,
  frameWidth: 0.11,
  spacing: 0.07,
  layers: ["M5", "M4"],
};

export const sandwichExample: SandwichParameters = {
  shape: "sandwich",
  fingerCount: 3,
  activeHeight: 1.5,
  fingerWidth: 0.05,
  barWidth: 0.38,
  frameWidth: 0.38,
  spacing: 0.07,
  layers: ["M7", "M6", "M5"],
};

/** Raw t28-like profile for parse tests. */
export function rawProfile(): Record<string, unknown> {
  return {
    name: "test",
    minSpacing: 0.05,
    minWidth: 0.05,
    minArea: 0.01,
    endOfLineSpacing: 0.07,
    viaPitch: 0.52,
    viaMargin: 0.2,
    widthQuantBase: 0.38,
    widthQuantStep: 0.52,
    allowedLayers: ["M1", "M2", "M3", "M4", "M5", "M6", "M7", "M8", "M9"],
    layerNamingStyle: "M",
    lowParasiticExcludedLayers: ["M1", "M2"],
  };
}
