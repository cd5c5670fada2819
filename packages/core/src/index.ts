// Errors
export { ConfigError, GeometryError, ParameterError, type GeometryConstraint } from "./errors.js";

// Technology
export {
  BUILTIN_TECHNOLOGIES,
  checkTechnology,
  isWellFormed,
  layerIndex,
  loadTechnology,
  parseTechnology,
  type BuiltinTechnology,
  type LayerNamingStyle,
  type TechnologyProfile,
} from "./technology.js";

// Grid arithmetic
export { fromUnits, isQuantized, quantizeWidth, toUnits, viaCount } from "./units.js";

// Shapes
export {
  computeGeometry,
  HShapeBuilder,
  IShapeBuilder,
  isShapeKind,
  SandwichBuilder,
  seededRng,
  SHAPE_KINDS,
  shapeBuilders,
} from "./shapes/index.js";
export type {
  Feature,
  GeometryResult,
  HShapeParameters,
  IShapeParameters,
  Measure,
  Net,
  NumericParam,
  ParamDef,
  ParamRange,
  PathFeature,
  Pin,
  RectFeature,
  Rng,
  SandwichParameters,
  ShapeBuilder,
  ShapeKind,
  ShapeParameters,
  ViaRow,
} from "./shapes/index.js";

export { parseShapeParameters } from "./params.js";

// Checking and drawing
export { featureArea, validate, type ValidationOutcome, type Violation, type ViolationCode } from "./validate.js";
export { DEFAULT_LABEL_HEIGHT, render } from "./render.js";
export { compileCapacitor, type CompileOptions, type CompileResult } from "./compile.js";

// Arrays
export {
  assembleArray,
  DEFAULT_MASTER,
  mergeMosaic,
  toMosaicPlacements,
  type ArrayGrid,
  type AssembledArray,
  type MosaicRegion,
} from "./mosaic.js";
export { parseArrayGrid } from "./grid.js";
