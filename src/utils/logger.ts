/**
 * Console logger for dashboard refreshes.
 * Events are single-line JSON so they are easy to grep in the browser console
 * or a log drain; debug output only appears in development builds.
 */

import { ContextualError, toError } from './errors';

const DEBUG_ENABLED = import.meta.env.DEV === true;

export interface FailureLog {
  correlationId: string;
  operation: string;
  queryId?: number;
  error: string;
  context?: Record<string, unknown>;
  stack?: string;
}

/**
 * Generate a correlation ID for one dashboard refresh
 * Format: timestamp-randomString (e.g., 1731628800123-abc123xyz)
 */
export function generateCorrelationId(): string {
  const timestamp = Date.now();
  const random = Math.random().toString(36).substring(2, 11);
  return `${timestamp}-${random}`;
}

export function getTimestamp(): string {
  return new Date().toISOString();
}

export function logEvent(event: string, data: Record<string, unknown> = {}): void {
  console.log(JSON.stringify({
    event,
    timestamp: getTimestamp(),
    ...data,
  }));
}

export function logFailure(data: FailureLog): void {
  console.error(JSON.stringify({
    event: 'failure',
    timestamp: getTimestamp(),
    ...data,
  }));
}

/**
 * Log an error caught at a boundary, keeping the ContextualError context if present
 */
export function logCaughtError(correlationId: string, operation: string, error: unknown, queryId?: number): void {
  const err = toError(error);
  const context = err instanceof ContextualError ? err.context : undefined;
  logFailure({
    correlationId,
    operation: context?.operation ?? operation,
    queryId: context?.queryId ?? queryId,
    error: err.message,
    context: context?.additionalInfo,
    stack: err.stack,
  });
}

export function debug(tag: string, message: string, details?: unknown): void {
  if (!DEBUG_ENABLED) return;
  console.log(`[${tag}] ${message}`, details ?? '');
}
