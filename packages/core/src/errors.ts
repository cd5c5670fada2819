/**
 * Errors raised by the geometry compiler.
 *
 * Validation problems are not errors: they come back from `validate()` as
 * violations the caller can fix and resubmit.
 */

/** Malformed technology profile. Fatal for the profile, never retried. */
export class ConfigError extends Error {
  constructor(
    message: string,
    public field: string,
  ) {
    super(`${field}: ${message}`);
    this.name = "ConfigError";
  }
}

/** Constraint tags a builder can attach to a {@link GeometryError}. */
export type GeometryConstraint =
  | "parity-violation"
  | "non-positive-span"
  | "off-grid"
  | "layer-count";

/** A parameter set a shape cannot be built from. */
export class GeometryError extends Error {
  constructor(
    message: string,
    public constraint: GeometryConstraint,
    public field: string,
  ) {
    super(`${field}: ${message}`);
    this.name = "GeometryError";
  }
}

/** A request whose fields have the wrong type or are missing. */
export class ParameterError extends Error {
  constructor(
    message: string,
    public field: string,
  ) {
    super(`${field}: ${message}`);
    this.name = "ParameterError";
  }
}
