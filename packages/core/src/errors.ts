/**
 * Error types for record indices
 *
 * Invariants:
 * - Index contracts never throw for "no match"; these cover the reference layer only
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all record-index errors
 */
export abstract class IndexError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when the default key ordering is given keys it cannot order
 */
export class IncomparableKeysError extends IndexError {
  readonly code = "E_KEY_ORDER";

  constructor(
    public readonly left: unknown,
    public readonly right: unknown,
    options?: ErrorOptions
  ) {
    super(`Cannot order keys ${describeKey(left)} and ${describeKey(right)}`, options);
  }
}

/**
 * Thrown when an operation needs a capability the index was not given
 */
export class CapabilityError extends IndexError {
  readonly code = "E_CAPABILITY";

  constructor(
    public readonly index: string,
    public readonly capability: string,
    options?: ErrorOptions
  ) {
    super(`Index "${index}" was built without ${capability}`, options);
  }
}

/**
 * Thrown when environment configuration is invalid
 */
export class ConfigError extends IndexError {
  readonly code = "E_CONFIG";

  constructor(
    public readonly issues: string[],
    options?: ErrorOptions
  ) {
    super(`Invalid configuration: ${issues.join("; ")}`, options);
  }
}

function describeKey(value: unknown): string {
  if (value instanceof Date) {
    return `Date(${Number.isNaN(value.getTime()) ? "invalid" : value.toISOString()})`;
  }
  if (typeof value === "bigint") {
    return `${value}n`;
  }
  if (typeof value === "string") {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map(describeKey).join(", ")}]`;
  }
  if (value === null || typeof value !== "object") {
    return String(value);
  }
  return Object.prototype.toString.call(value);
}
