/**
 * Integer grid arithmetic.
 *
 * Builders work in whole grid units so that sums of widths and spacings stay
 * exact; values only turn back into µm when they are stored in a result.
 */

import { DECIMALS, GRID_UNIT, isOnGrid } from "@capforge/ir";
import type { TechnologyProfile } from "./technology.js";

/** µm → nearest whole number of grid units. */
export function toUnits(value: number): number {
  return Math.round(value / GRID_UNIT);
}

/** Grid units → µm, free of binary rounding noise. */
export function fromUnits(units: number): number {
  return Number((units * GRID_UNIT).toFixed(DECIMALS));
}

/** µm → grid units, rounding up anything not already on grid. */
function ceilUnits(value: number): number {
  return Math.ceil(value / GRID_UNIT - 1e-6);
}

/**
 * Round a requested width up to the next `base + step × n`.
 *
 * @example
 * ```typescript
 * // base 0.38, step 0.52
 * quantizeWidth(0.38, t28); // 0.38
 * quantizeWidth(0.40, t28); // 0.9
 * ```
 */
export function quantizeWidth(requested: number, tech: TechnologyProfile): number {
  const base = toUnits(tech.widthQuantBase);
  const step = toUnits(tech.widthQuantStep);
  const want = ceilUnits(requested);
  const n = want <= base ? 0 : Math.ceil((want - base) / step);
  return fromUnits(base + n * step);
}

/** True when `width` is exactly one of the quantized widths. */
export function isQuantized(width: number, tech: TechnologyProfile): boolean {
  if (!isOnGrid(width)) return false;
  const w = toUnits(width);
  const base = toUnits(tech.widthQuantBase);
  const step = toUnits(tech.widthQuantStep);
  return w >= base && (w - base) % step === 0;
}

/** Number of via cuts that fit along `span`: `max(1, floor((span + margin) / pitch))`. */
export function viaCount(span: number, tech: TechnologyProfile): number {
  const fit = Math.floor((toUnits(span) + toUnits(tech.viaMargin)) / toUnits(tech.viaPitch));
  return Math.max(1, fit);
}
