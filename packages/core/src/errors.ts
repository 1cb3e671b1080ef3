/** Raised at startup when required settings are absent or unusable. */
export class ConfigError extends Error {
  constructor(
    readonly missing: string[],
    readonly invalid: string[] = [],
  ) {
    super(ConfigError.describe(missing, invalid));
    this.name = 'ConfigError';
  }

  private static describe(missing: string[], invalid: string[]): string {
    const parts: string[] = [];
    if (missing.length > 0) {
      parts.push(`Missing required environment variables: ${missing.join(', ')}`);
    }
    if (invalid.length > 0) {
      parts.push(`Invalid environment variables: ${invalid.join(', ')}`);
    }
    return parts.join('. ') || 'Invalid configuration';
  }
}

export type InferenceErrorKind = 'connection' | 'timeout' | 'http' | 'malformed' | 'request';

/** Failure of a single call to the inference endpoint. Never retried. */
export class InferenceError extends Error {
  readonly kind: InferenceErrorKind;
  /** HTTP status, set only for `http` failures. */
  readonly status?: number;

  constructor(kind: InferenceErrorKind, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'InferenceError';
    this.kind = kind;
    this.status = options.status;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
