/**
 * Model call errors
 *
 * Every failure of the injected model capability is classified into one of
 * these kinds. The analysis client treats all of them as "AI unavailable".
 */

export const ModelErrorKind = {
  TIMEOUT: 'timeout',
  RATE_LIMITED: 'rate_limited',
  PROVIDER_ERROR: 'provider_error',
  INVALID_RESPONSE: 'invalid_response',
} as const;

export type ModelErrorKind = (typeof ModelErrorKind)[keyof typeof ModelErrorKind];

export class ModelCallError extends Error {
  kind: ModelErrorKind;
  status?: number;
  cause?: unknown;

  constructor(kind: ModelErrorKind, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message);
    this.name = 'ModelCallError';
    this.kind = kind;
    this.status = options.status;
    this.cause = options.cause;
  }

  /**
   * Timeouts, rate limits and 5xx provider errors may succeed on another attempt
   */
  get retryable(): boolean {
    switch (this.kind) {
      case ModelErrorKind.TIMEOUT:
      case ModelErrorKind.RATE_LIMITED:
        return true;
      case ModelErrorKind.PROVIDER_ERROR:
        return this.status === undefined || this.status >= 500;
      default:
        return false;
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      ...(this.status !== undefined && { status: this.status }),
    };
  }
}

/**
 * Type guard for ModelCallError
 */
export function isModelCallError(error: unknown): error is ModelCallError {
  return error instanceof ModelCallError;
}

/**
 * Wrap an arbitrary failure as a ModelCallError
 */
export function toModelCallError(error: unknown): ModelCallError {
  if (error instanceof ModelCallError) return error;

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    if (error.name === 'AbortError' || message.includes('timeout') || message.includes('timed out')) {
      return new ModelCallError(ModelErrorKind.TIMEOUT, error.message, { cause: error });
    }
    if (message.includes('rate limit') || message.includes('too many requests')) {
      return new ModelCallError(ModelErrorKind.RATE_LIMITED, error.message, { cause: error });
    }
    return new ModelCallError(ModelErrorKind.PROVIDER_ERROR, error.message, { cause: error });
  }

  return new ModelCallError(ModelErrorKind.PROVIDER_ERROR, String(error), { cause: error });
}
