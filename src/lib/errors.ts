/**
 * Error taxonomy shared by the calculation and rendering stages.
 *
 * Configuration and validation errors abort a run. Range and render errors
 * are raised per metric/scope or per output and caught by the stage, which
 * logs a warning and skips only the affected rows or files.
 */

/** A required file is missing; the message names the stage to run first. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** Input that cannot be used as given: missing columns, malformed colors, bad names. */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class UnknownStyleError extends ValidationError {
  readonly style: string;

  constructor(style: string, known: readonly string[]) {
    super(`Unknown colormap style "${style}" (expected one of: ${known.join(', ')})`);
    this.name = 'UnknownStyleError';
    this.style = style;
  }
}

/** No values to derive a normalization range from. */
export class NormalizationRangeError extends RangeError {
  readonly metric: string;
  readonly scope: string;

  constructor(metric: string, scope: string) {
    super(`No values available to compute the ${scope} range for ${metric}`);
    this.name = 'NormalizationRangeError';
    this.metric = metric;
    this.scope = scope;
  }
}

/** A requested output has no rows of the scope it is drawn from. */
export class RenderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RenderError';
  }
}

export function isFatalError(err: unknown): err is ConfigurationError | ValidationError {
  return err instanceof ConfigurationError || err instanceof ValidationError;
}
