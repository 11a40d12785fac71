/**
 * Error types shared across vulnrank core.
 * Every error carries a stable `name` so callers can branch without instanceof
 * across package boundaries.
 */

/**
 * Base class for all vulnrank-specific errors.
 */
export class VulnrankError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "VulnrankError";
  }
}

/**
 * A required numeric or date field was missing, non-finite or unparseable.
 * Raised by the scoring core; never retried.
 */
export class InvalidInputError extends VulnrankError {
  readonly field: string;
  readonly value: unknown;
  readonly reason: string;

  constructor(field: string, value: unknown, reason: string = "must be a finite number") {
    super(`Invalid ${field}: ${describeValue(value)} ${reason}`);
    this.name = "InvalidInputError";
    this.field = field;
    this.value = value;
    this.reason = reason;
  }
}

export interface FieldError {
  field: string;
  message: string;
  value?: unknown;
}

/**
 * Configuration file failed YAML parsing or schema validation.
 */
export class ConfigValidationError extends VulnrankError {
  readonly errors: FieldError[];

  constructor(source: string, errors: FieldError[]) {
    const details = errors.map((e) => `${e.field}: ${e.message}`).join("; ");
    super(`Invalid configuration in ${source}: ${details}`);
    this.name = "ConfigValidationError";
    this.errors = errors;
  }
}

/**
 * A vulnerability or intelligence source could not be read or parsed.
 */
export class IngestionError extends VulnrankError {
  readonly source: string;

  constructor(source: string, reason: string) {
    super(`Failed to ingest ${source}: ${reason}`);
    this.name = "IngestionError";
    this.source = source;
  }
}

export class UnsupportedFormatError extends VulnrankError {
  constructor(format: string, supported: readonly string[]) {
    super(`Unsupported format "${format}". Supported: ${supported.join(", ")}`);
    this.name = "UnsupportedFormatError";
  }
}

export class RecordNotFoundError extends VulnrankError {
  constructor(recordType: string, recordId: string) {
    super(`${recordType} with id ${recordId} not found`);
    this.name = "RecordNotFoundError";
  }
}

function describeValue(value: unknown): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "number" || typeof value === "boolean" || value === null || value === undefined) {
    return String(value);
  }
  return typeof value;
}

/**
 * Extracts a printable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  // errors raised by Node built-ins in another realm (e.g. a Jest sandbox) fail instanceof
  if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
    return error.message;
  }
  return String(error);
}
