import type { ValidationReport } from "./validation.js";

export class InputFormatError extends Error {
  constructor(message: string, public readonly statusCode: number = 415) {
    super(message);
    this.name = "InputFormatError";
  }
}

export class EncodingDetectionError extends Error {
  constructor(message: string, public readonly statusCode: number = 422) {
    super(message);
    this.name = "EncodingDetectionError";
  }
}

export class SizeLimitExceeded extends Error {
  constructor(
    message: string,
    public readonly size: number,
    public readonly limit: number,
    public readonly statusCode: number = 413
  ) {
    super(message);
    this.name = "SizeLimitExceeded";
  }
}

export class ConfigurationError extends Error {
  constructor(message: string, public readonly statusCode: number = 400) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class ValidationDisabledError extends Error {
  constructor(message = "Validation is disabled (enable_validation=false)", public readonly statusCode: number = 409) {
    super(message);
    this.name = "ValidationDisabledError";
  }
}

/**
 * Raised in strict mode when validation finds at least one critical result.
 * No HTML is produced.
 */
export class CriticalValidationError extends Error {
  constructor(public readonly report: ValidationReport, public readonly statusCode: number = 422) {
    super(`Validation found ${report.summary.critical} critical error(s)`);
    this.name = "CriticalValidationError";
  }
}

/** Internal structural invariant broken during assembly or rendering */
export class RenderError extends Error {
  constructor(message: string, public readonly statusCode: number = 500) {
    super(message);
    this.name = "RenderError";
  }
}

export type ConverterError =
  | InputFormatError
  | EncodingDetectionError
  | SizeLimitExceeded
  | ConfigurationError
  | ValidationDisabledError
  | CriticalValidationError
  | RenderError;

export function isConverterError(err: unknown): err is ConverterError {
  return err instanceof InputFormatError
    || err instanceof EncodingDetectionError
    || err instanceof SizeLimitExceeded
    || err instanceof ConfigurationError
    || err instanceof ValidationDisabledError
    || err instanceof CriticalValidationError
    || err instanceof RenderError;
}
