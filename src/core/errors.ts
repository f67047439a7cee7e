/**
 * Error types shared across the screener.
 *
 * Fetch paths report problems through tagged outcomes; these classes are
 * reserved for misconfiguration and for carrying transport failures inside
 * a `fatal` outcome.
 */

export class MissingCredentialError extends Error {
  constructor(public readonly variable: string) {
    super(`Missing required environment variable: ${variable}`);
    this.name = 'MissingCredentialError';
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly file: string
  ) {
    super(`${file}: ${message}`);
    this.name = 'ConfigError';
  }
}

export class ProviderError extends Error {
  constructor(
    message: string,
    public provider: string,
    public symbol: string | null,
    public method: string,
    public cause?: Error
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export class RunValidationError extends Error {
  constructor(public readonly errors: string[]) {
    super(`Screen run validation failed: ${errors.join('; ')}`);
    this.name = 'RunValidationError';
  }
}
