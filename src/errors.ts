/**
 * Error types. Only ConfigurationError and UsageError are fatal; a
 * TruncatedFieldError stays inside the occurrence that raised it.
 */

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly exitCode = 1
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class UsageError extends ConfigurationError {
  constructor(message: string) {
    super(message, 2);
    this.name = 'UsageError';
  }
}

/**
 * A fixed-offset field or length/offset payload reaches past the end of the buffer.
 */
export class TruncatedFieldError extends Error {
  constructor(
    public readonly field: string,
    public readonly start: number,
    public readonly end: number,
    public readonly limit: number
  ) {
    super(`${field}: needs bytes [${start}, ${end}) but data ends at ${limit}`);
    this.name = 'TruncatedFieldError';
  }
}
