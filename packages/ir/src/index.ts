/**
 * @capforge/ir: Drawing primitive vocabulary for capforge layouts.
 *
 * Everything a shape renderer or the array assembler emits is one of the five
 * primitive kinds below. Coordinates are in micrometres and every number that
 * leaves this package is a multiple of {@link GRID_UNIT}.
 */

/** Manufacturing grid in µm. Every emitted coordinate, width and size snaps to it. */
export const GRID_UNIT = 0.005;

/** Number of decimal digits used when a value is written as a literal. */
export const DECIMALS = 3;

/** 2D point in µm. */
export interface Point {
  x: number;
  y: number;
}

/** How a path ends at its first and last point. */
export type PathEnd = 'truncate' | 'extend';

/** Placement of a label's text relative to its origin. */
export type LabelJustify = 'centerCenter' | 'centerLeft' | 'lowerLeft';

/** Orientation of a label or a placed instance. */
export type Orientation = 'R0' | 'R90' | 'R180' | 'R270';

// --- DrawPrimitive discriminated union ---

/** Centreline path on a metal layer's drawing purpose. */
export interface PathPrimitive {
  kind: 'Path';
  layer: string;
  points: readonly Point[];
  width: number;
  end: PathEnd;
}

/** Via array between two adjacent metal layers, centred on `origin`. */
export interface ViaPrimitive {
  kind: 'Via';
  /** Via definition name, see {@link viaDefName}. */
  viaDef: string;
  origin: Point;
  rows: number;
  columns: number;
}

/** Pin label on a metal layer's pin purpose. */
export interface LabelPrimitive {
  kind: 'Label';
  layer: string;
  origin: Point;
  text: string;
  justify: LabelJustify;
  orientation: Orientation;
  height: number;
}

/** Axis-aligned rectangle. Only solid sandwich plates are drawn this way. */
export interface RectPrimitive {
  kind: 'Rect';
  layer: string;
  lowerLeft: Point;
  upperRight: Point;
}

/** Repeated placement of a unit cell: `rows` × `columns` copies from `origin`. */
export interface MosaicPrimitive {
  kind: 'Mosaic';
  master: string;
  origin: Point;
  rows: number;
  columns: number;
  /** Column spacing in `x`, row spacing in `y`. */
  pitch: Point;
}

/** A single drawing command. */
export type DrawPrimitive =
  | PathPrimitive
  | ViaPrimitive
  | LabelPrimitive
  | RectPrimitive
  | MosaicPrimitive;

/** All primitive kinds, in the order the compact format documents them. */
export const PRIMITIVE_KINDS = ['Path', 'Via', 'Label', 'Rect', 'Mosaic'] as const;

/** Name of the via definition joining `lower` to `upper`, e.g. `M4_M3`. */
export function viaDefName(lower: string, upper: string): string {
  return `${upper}_${lower}`;
}

// ============================================================================
// Grid snapping and literal formatting
// ============================================================================

/** Snap a value to the nearest multiple of {@link GRID_UNIT}. */
export function snap(value: number): number {
  const units = Math.round(value / GRID_UNIT);
  return Number((units * GRID_UNIT).toFixed(DECIMALS));
}

/** Snap both coordinates of a point. */
export function snapPoint(p: Point): Point {
  return { x: snap(p.x), y: snap(p.y) };
}

/** True when `value` is finite and lies on the grid. */
export function isOnGrid(value: number): boolean {
  if (!Number.isFinite(value)) return false;
  const units = value / GRID_UNIT;
  return Math.abs(units - Math.round(units)) < 1e-6;
}

/**
 * Write a grid value as a fixed-precision literal.
 *
 * Callers snap first; a value that reaches this point off grid means a
 * renderer skipped {@link snap}, so it throws instead of rounding.
 *
 * @example
 * ```typescript
 * formatLiteral(0.9);   // "0.900"
 * formatLiteral(0.0025); // throws RenderError
 * ```
 */
export function formatLiteral(value: number): string {
  if (!isOnGrid(value)) {
    throw new RenderError(`${value} is not a multiple of the ${GRID_UNIT} grid`);
  }
  return snap(value).toFixed(DECIMALS);
}

/** Write a non-negative integer count (via rows, mosaic columns). */
export function formatCount(value: number): string {
  if (!Number.isInteger(value) || value < 1) {
    throw new RenderError(`${value} is not a positive integer count`);
  }
  return String(value);
}

/** Every numeric field of a primitive, for invariant checks. */
export function numericFields(prim: DrawPrimitive): number[] {
  switch (prim.kind) {
    case 'Path':
      return [prim.width, ...prim.points.flatMap(p => [p.x, p.y])];
    case 'Via':
      return [prim.origin.x, prim.origin.y];
    case 'Label':
      return [prim.origin.x, prim.origin.y, prim.height];
    case 'Rect':
      return [prim.lowerLeft.x, prim.lowerLeft.y, prim.upperRight.x, prim.upperRight.y];
    case 'Mosaic':
      return [prim.origin.x, prim.origin.y, prim.pitch.x, prim.pitch.y];
  }
}

// ============================================================================
// JSON
// ============================================================================

/** Serialize primitives to a JSON string. */
export function toJson(primitives: readonly DrawPrimitive[]): string {
  return JSON.stringify(primitives, null, 2);
}

// ============================================================================
// Compact format (one primitive per line)
// ============================================================================

/** Current compact format version. */
export const COMPACT_VERSION = '0.1';

/**
 * Write primitives in the compact line format.
 *
 * ```
 * P <layer> <width> <end> <x1> <y1> <x2> <y2> ...
 * V <viaDef> <x> <y> <rows> <columns>
 * L <layer> <x> <y> <height> <justify> <orientation> "<text>"
 * R <layer> <x1> <y1> <x2> <y2>
 * MOS <master> <x> <y> <rows> <columns> <pitchX> <pitchY>
 * ```
 *
 * Two runs over the same primitives produce identical text, so successive
 * parameter rounds can be diffed line by line.
 */
export function toCompact(primitives: readonly DrawPrimitive[]): string {
  const lines: string[] = [`# capforge ${COMPACT_VERSION}`];
  for (const prim of primitives) {
    lines.push(formatPrimitive(prim));
  }
  return lines.join('\n') + '\n';
}

/** Parse compact text back into primitives. */
export function fromCompact(compact: string): DrawPrimitive[] {
  const primitives: DrawPrimitive[] = [];
  const lines = compact.split('\n');

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line || line.startsWith('#')) continue;
    primitives.push(parsePrimitiveLine(splitLineRespectingQuotes(line), i + 1));
  }

  return primitives;
}

function formatPrimitive(prim: DrawPrimitive): string {
  switch (prim.kind) {
    case 'Path': {
      const pts = prim.points.map(p => `${formatLiteral(p.x)} ${formatLiteral(p.y)}`).join(' ');
      return `P ${escapeId(prim.layer)} ${formatLiteral(prim.width)} ${prim.end} ${pts}`;
    }
    case 'Via':
      return `V ${escapeId(prim.viaDef)} ${formatLiteral(prim.origin.x)} ${formatLiteral(prim.origin.y)} ${formatCount(prim.rows)} ${formatCount(prim.columns)}`;
    case 'Label':
      return `L ${escapeId(prim.layer)} ${formatLiteral(prim.origin.x)} ${formatLiteral(prim.origin.y)} ${formatLiteral(prim.height)} ${prim.justify} ${prim.orientation} ${formatQuotedString(prim.text)}`;
    case 'Rect':
      return `R ${escapeId(prim.layer)} ${formatLiteral(prim.lowerLeft.x)} ${formatLiteral(prim.lowerLeft.y)} ${formatLiteral(prim.upperRight.x)} ${formatLiteral(prim.upperRight.y)}`;
    case 'Mosaic':
      return `MOS ${escapeId(prim.master)} ${formatLiteral(prim.origin.x)} ${formatLiteral(prim.origin.y)} ${formatCount(prim.rows)} ${formatCount(prim.columns)} ${formatLiteral(prim.pitch.x)} ${formatLiteral(prim.pitch.y)}`;
  }
}

function parsePrimitiveLine(parts: string[], line: number): DrawPrimitive {
  const opcode = parts[0];
  switch (opcode) {
    case 'P': {
      if (parts.length < 8 || (parts.length - 4) % 2 !== 0) {
        throw new CompactParseError(line, `P requires layer, width, end and at least 2 points, got ${parts.length - 1} args`);
      }
      const points: Point[] = [];
      for (let k = 4; k < parts.length; k += 2) {
        points.push({ x: parseNumber(parts[k], line), y: parseNumber(parts[k + 1], line) });
      }
      return {
        kind: 'Path',
        layer: parseStringArg(parts[1]),
        width: parseNumber(parts[2], line),
        end: parsePathEnd(parts[3], line),
        points,
      };
    }

    case 'V':
      if (parts.length !== 6) throw new CompactParseError(line, `V requires 5 args, got ${parts.length - 1}`);
      return {
        kind: 'Via',
        viaDef: parseStringArg(parts[1]),
        origin: { x: parseNumber(parts[2], line), y: parseNumber(parts[3], line) },
        rows: parseCount(parts[4], line),
        columns: parseCount(parts[5], line),
      };

    case 'L':
      if (parts.length !== 8) throw new CompactParseError(line, `L requires 7 args, got ${parts.length - 1}`);
      return {
        kind: 'Label',
        layer: parseStringArg(parts[1]),
        origin: { x: parseNumber(parts[2], line), y: parseNumber(parts[3], line) },
        height: parseNumber(parts[4], line),
        justify: parseJustify(parts[5], line),
        orientation: parseOrientation(parts[6], line),
        text: parseStringArg(parts[7]),
      };

    case 'R':
      if (parts.length !== 6) throw new CompactParseError(line, `R requires 5 args, got ${parts.length - 1}`);
      return {
        kind: 'Rect',
        layer: parseStringArg(parts[1]),
        lowerLeft: { x: parseNumber(parts[2], line), y: parseNumber(parts[3], line) },
        upperRight: { x: parseNumber(parts[4], line), y: parseNumber(parts[5], line) },
      };

    case 'MOS':
      if (parts.length !== 8) throw new CompactParseError(line, `MOS requires 7 args, got ${parts.length - 1}`);
      return {
        kind: 'Mosaic',
        master: parseStringArg(parts[1]),
        origin: { x: parseNumber(parts[2], line), y: parseNumber(parts[3], line) },
        rows: parseCount(parts[4], line),
        columns: parseCount(parts[5], line),
        pitch: { x: parseNumber(parts[6], line), y: parseNumber(parts[7], line) },
      };

    default:
      throw new CompactParseError(line, `Unknown opcode: ${opcode}`);
  }
}

// ============================================================================
// Compact Format Helper Functions
// ============================================================================

function parseNumber(s: string, line: number): number {
  const value = Number(s);
  if (s.trim() === '' || !Number.isFinite(value)) {
    throw new CompactParseError(line, `expected a number, got '${s}'`);
  }
  return value;
}

function parseCount(s: string, line: number): number {
  const value = parseNumber(s, line);
  if (!Number.isInteger(value) || value < 1) {
    throw new CompactParseError(line, `expected a positive integer, got '${s}'`);
  }
  return value;
}

function parsePathEnd(s: string, line: number): PathEnd {
  if (s === 'truncate' || s === 'extend') return s;
  throw new CompactParseError(line, `Unknown path end: ${s}`);
}

function parseJustify(s: string, line: number): LabelJustify {
  if (s === 'centerCenter' || s === 'centerLeft' || s === 'lowerLeft') return s;
  throw new CompactParseError(line, `Unknown label justification: ${s}`);
}

function parseOrientation(s: string, line: number): Orientation {
  if (s === 'R0' || s === 'R90' || s === 'R180' || s === 'R270') return s;
  throw new CompactParseError(line, `Unknown orientation: ${s}`);
}

/** Split a line by whitespace, but keep quoted strings (with `\\` escapes) together. */
function splitLineRespectingQuotes(line: string): string[] {
  const parts: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const c = line[i];

    if (inQuotes) {
      current += c;
      if (c === '\\' && i + 1 < line.length) {
        current += line[++i];
      } else if (c === '"') {
        parts.push(current);
        current = '';
        inQuotes = false;
      }
    } else if (c === '"') {
      if (current) parts.push(current);
      current = c;
      inQuotes = true;
    } else if (/\s/.test(c)) {
      if (current) parts.push(current);
      current = '';
    } else {
      current += c;
    }
  }

  if (current) {
    parts.push(current);
  }

  return parts;
}

/** Parse a potentially quoted string argument. */
function parseStringArg(s: string): string {
  if (s.startsWith('"') && s.endsWith('"') && s.length >= 2) {
    const inner = s.slice(1, -1);
    return inner.replace(/\\(["\\])/g, '$1');
  }
  return s;
}

/** Quote an identifier if it contains spaces or quotes. */
function escapeId(s: string): string {
  if (/[\s"]/.test(s) || s.length === 0) {
    return formatQuotedString(s);
  }
  return s;
}

/** Format a string with quotes. */
function formatQuotedString(s: string): string {
  return `"${s.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

// ============================================================================
// Host script
// ============================================================================

/** Cell view the host script writes into. */
export interface ScriptTarget {
  library: string;
  cell: string;
  /** Library holding mosaic masters. Defaults to `library`. */
  masterLibrary?: string;
}

/**
 * Serialize primitives as a host-tool layout script.
 *
 * Output is a straight-line sequence drawn from a closed set of calls: open
 * the cell view, one create call per primitive, save, close. It contains no
 * loops, conditionals or procedure definitions; every number is written with
 * {@link formatLiteral}.
 */
export function toHostScript(primitives: readonly DrawPrimitive[], target: ScriptTarget): string {
  const lines: string[] = [];
  const masterLib = target.masterLibrary ?? target.library;

  lines.push(`cv = dbOpenCellViewByType(${skillString(target.library)} ${skillString(target.cell)} "layout" "maskLayout" "w")`);
  for (const prim of primitives) {
    lines.push(formatHostCall(prim, masterLib));
  }
  lines.push('dbSave(cv)');
  lines.push('dbClose(cv)');

  return lines.join('\n') + '\n';
}

function formatHostCall(prim: DrawPrimitive, masterLib: string): string {
  switch (prim.kind) {
    case 'Path':
      return `dbCreatePath(cv list(${skillString(prim.layer)} "drawing") ${skillPoints(prim.points)} ${formatLiteral(prim.width)} ${skillString(prim.end)})`;
    case 'Via':
      return `dbCreateVia(cv techFindViaDefByName(techGetTechFile(cv) ${skillString(prim.viaDef)}) ${skillPoint(prim.origin)} "R0" list(list("cutRows" ${formatCount(prim.rows)}) list("cutColumns" ${formatCount(prim.columns)})))`;
    case 'Label':
      return `dbCreateLabel(cv list(${skillString(prim.layer)} "pin") ${skillPoint(prim.origin)} ${skillString(prim.text)} ${skillString(prim.justify)} ${skillString(prim.orientation)} "roman" ${formatLiteral(prim.height)})`;
    case 'Rect':
      return `dbCreateRect(cv list(${skillString(prim.layer)} "drawing") list(${skillPoint(prim.lowerLeft)} ${skillPoint(prim.upperRight)}))`;
    case 'Mosaic':
      return `dbCreateSimpleMosaic(cv dbOpenCellViewByType(${skillString(masterLib)} ${skillString(prim.master)} "layout") nil ${skillPoint(prim.origin)} "R0" ${formatCount(prim.rows)} ${formatCount(prim.columns)} ${formatLiteral(prim.pitch.y)} ${formatLiteral(prim.pitch.x)})`;
  }
}

function skillPoint(p: Point): string {
  return `list(${formatLiteral(p.x)} ${formatLiteral(p.y)})`;
}

function skillPoints(points: readonly Point[]): string {
  return `list(${points.map(skillPoint).join(' ')})`;
}

function skillString(s: string): string {
  return formatQuotedString(s);
}

// ============================================================================
// Errors
// ============================================================================

/** Thrown when a value breaks the numeric output contract. Always a defect. */
export class RenderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RenderError';
  }
}

/** Error thrown when parsing compact text fails. `line` is 1-based. */
export class CompactParseError extends Error {
  line: number;

  constructor(line: number, message: string) {
    super(`line ${line}: ${message}`);
    this.name = 'CompactParseError';
    this.line = line;
  }
}
