/**
 * Technology profiles: the process constants every shape builder reads.
 */

import { readFileSync } from "node:fs";
import { GRID_UNIT, isOnGrid } from "@capforge/ir";
import { ConfigError } from "./errors.js";

/** How metal layers are named: `M1, M2, …` or `METAL1, METAL2, …`. */
export type LayerNamingStyle = "M" | "METAL";

/** Process constants for one technology node. All lengths in µm. */
export interface TechnologyProfile {
  readonly name: string;
  readonly minSpacing: number;
  readonly minWidth: number;
  /** Minimum metal area in µm². */
  readonly minArea?: number;
  /** Spacing required at a finger tip facing a bar, where stricter than `minSpacing`. */
  readonly endOfLineSpacing?: number;
  readonly viaPitch: number;
  /** Extra span a via array may claim past its last cut. */
  readonly viaMargin: number;
  readonly widthQuantBase: number;
  readonly widthQuantStep: number;
  /** Metal layers, lowest first. */
  readonly allowedLayers: readonly string[];
  readonly layerNamingStyle: LayerNamingStyle;
  /** Layers that may not carry capacitor plates in low-parasitic mode. */
  readonly lowParasiticExcludedLayers?: readonly string[];
}

/** Profiles shipped in `technologies/`. */
export const BUILTIN_TECHNOLOGIES = ["t28", "t180"] as const;

export type BuiltinTechnology = (typeof BUILTIN_TECHNOLOGIES)[number];

const LAYER_PATTERNS: Record<LayerNamingStyle, RegExp> = {
  M: /^M(\d+)$/,
  METAL: /^METAL(\d+)$/,
};

/** Metal index of a layer name under the given style, or `undefined`. */
export function layerIndex(layer: string, style: LayerNamingStyle): number | undefined {
  const match = LAYER_PATTERNS[style].exec(layer);
  return match ? parseInt(match[1], 10) : undefined;
}

/**
 * Check a profile once, at load time.
 *
 * @throws ConfigError naming the first offending field.
 */
export function checkTechnology(tech: TechnologyProfile): void {
  if (tech.name.trim() === "") {
    throw new ConfigError("must not be empty", "name");
  }

  const positive = [
    "minSpacing",
    "minWidth",
    "viaPitch",
    "widthQuantBase",
    "widthQuantStep",
  ] as const;
  for (const field of positive) {
    requireGridLength(tech[field], field, false);
  }
  requireGridLength(tech.viaMargin, "viaMargin", true);
  if (tech.endOfLineSpacing !== undefined) {
    requireGridLength(tech.endOfLineSpacing, "endOfLineSpacing", false);
  }
  if (tech.minArea !== undefined && !(Number.isFinite(tech.minArea) && tech.minArea >= 0)) {
    throw new ConfigError(`must be >= 0, got ${tech.minArea}`, "minArea");
  }

  // Quantized widths are drawn as paths; an even unit count keeps their centreline on grid.
  for (const field of ["widthQuantBase", "widthQuantStep"] as const) {
    if (Math.round(tech[field] / GRID_UNIT) % 2 !== 0) {
      throw new ConfigError(`must be a multiple of ${2 * GRID_UNIT}`, field);
    }
  }

  if (tech.allowedLayers.length === 0) {
    throw new ConfigError("must list at least one layer", "allowedLayers");
  }
  let previous = 0;
  for (const layer of tech.allowedLayers) {
    const index = layerIndex(layer, tech.layerNamingStyle);
    if (index === undefined) {
      throw new ConfigError(
        `layer ${layer} does not follow the ${tech.layerNamingStyle} naming style`,
        "allowedLayers",
      );
    }
    if (index <= previous) {
      throw new ConfigError(`layer ${layer} is out of order or repeated`, "allowedLayers");
    }
    previous = index;
  }

  for (const layer of tech.lowParasiticExcludedLayers ?? []) {
    if (!tech.allowedLayers.includes(layer)) {
      throw new ConfigError(`layer ${layer} is not an allowed layer`, "lowParasiticExcludedLayers");
    }
  }
}

/** Predicate form of {@link checkTechnology}. */
export function isWellFormed(tech: TechnologyProfile): boolean {
  try {
    checkTechnology(tech);
    return true;
  } catch (err) {
    if (err instanceof ConfigError) return false;
    throw err;
  }
}

function requireGridLength(value: number, field: string, allowZero: boolean): void {
  if (!Number.isFinite(value) || value < 0 || (!allowZero && value === 0)) {
    throw new ConfigError(`must be ${allowZero ? ">= 0" : "> 0"}, got ${value}`, field);
  }
  if (!isOnGrid(value)) {
    throw new ConfigError(`${value} is not a multiple of the ${GRID_UNIT} grid`, field);
  }
}

// ============================================================================
// Parsing
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readNumber(obj: Record<string, unknown>, field: string): number;
function readNumber(obj: Record<string, unknown>, field: string, optional: true): number | undefined;
function readNumber(obj: Record<string, unknown>, field: string, optional = false): number | undefined {
  const value = obj[field];
  if (value === undefined && optional) return undefined;
  if (typeof value !== "number") {
    throw new ConfigError(value === undefined ? "is required" : "must be a number", field);
  }
  return value;
}

function readLayers(obj: Record<string, unknown>, field: string, optional: boolean): string[] | undefined {
  const value = obj[field];
  if (value === undefined && optional) return undefined;
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === "string")) {
    throw new ConfigError("must be an array of layer names", field);
  }
  return value;
}

/**
 * Build a profile from untrusted data (a parsed JSON file, a tool argument).
 * The result is checked and frozen.
 */
export function parseTechnology(raw: unknown): TechnologyProfile {
  if (!isRecord(raw)) {
    throw new ConfigError("technology profile must be an object", "<root>");
  }

  const name = raw.name;
  if (typeof name !== "string") {
    throw new ConfigError("is required", "name");
  }
  const style = raw.layerNamingStyle;
  if (style !== "M" && style !== "METAL") {
    throw new ConfigError(`must be "M" or "METAL", got ${JSON.stringify(style)}`, "layerNamingStyle");
  }

  const allowedLayers = readLayers(raw, "allowedLayers", false) ?? [];
  const excluded = readLayers(raw, "lowParasiticExcludedLayers", true);

  const tech: TechnologyProfile = {
    name,
    minSpacing: readNumber(raw, "minSpacing"),
    minWidth: readNumber(raw, "minWidth"),
    minArea: readNumber(raw, "minArea", true),
    endOfLineSpacing: readNumber(raw, "endOfLineSpacing", true),
    viaPitch: readNumber(raw, "viaPitch"),
    viaMargin: readNumber(raw, "viaMargin"),
    widthQuantBase: readNumber(raw, "widthQuantBase"),
    widthQuantStep: readNumber(raw, "widthQuantStep"),
    allowedLayers: Object.freeze([...allowedLayers]),
    layerNamingStyle: style,
    lowParasiticExcludedLayers: excluded ? Object.freeze([...excluded]) : undefined,
  };

  checkTechnology(tech);
  return Object.freeze(tech);
}

function isBuiltin(name: string): name is BuiltinTechnology {
  return BUILTIN_TECHNOLOGIES.some((t) => t === name);
}

/**
 * Load a profile by built-in name (`t28`, `t180`) or from a JSON file path.
 */
export function loadTechnology(nameOrPath: string): TechnologyProfile {
  const location = isBuiltin(nameOrPath)
    ? new URL(`../technologies/${nameOrPath}.json`, import.meta.url)
    : nameOrPath;

  let text: string;
  try {
    text = readFileSync(location, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`cannot read technology file: ${message}`, "<file>");
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`invalid JSON: ${message}`, "<file>");
  }
  return parseTechnology(raw);
}
