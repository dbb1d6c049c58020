/**
 * Error types shared by the loader, the compliance engine and configuration.
 */

export interface ErrorContext {
  operation: string;
  queryId?: number;
  additionalInfo?: Record<string, unknown>;
}

/**
 * Raised when a payload is not a column mapping, or when the BI service
 * answered with its own error instead of data.
 */
export class MalformedDatasetError extends Error {
  readonly code = 'MALFORMED_DATASET';

  constructor(message: string, public readonly upstreamError?: string) {
    super(message);
    this.name = 'MalformedDatasetError';
  }
}

export class ConfigError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Error with the operation context it happened in
 */
export class ContextualError extends Error {
  constructor(
    message: string,
    public context: ErrorContext,
    public originalError?: Error
  ) {
    super(message);
    this.name = 'ContextualError';
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      context: this.context,
      originalError: this.originalError?.message,
      stack: this.stack
    };
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Reject if the promise does not settle within timeoutMs
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  errorMessage: string = 'Operation timed out'
): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new Error(`${errorMessage} (after ${timeoutMs}ms)`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}
