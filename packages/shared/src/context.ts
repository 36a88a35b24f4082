/**
 * AsyncLocalStorage Context Management
 *
 * Carries the correlation ID and the document being parsed through an upload
 * request, so every log line of one parse call can be tied together.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface RequestContext {
  correlationId: string;
  documentId?: string;
  sourceFilename?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

/**
 * Get the current request context
 */
export function getContext(): RequestContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
 * Get the correlation ID from the current context, or generate a new one
 */
export function getCorrelationId(): string {
  const context = getContext();
  return context?.correlationId || ulid();
}

/**
 * Run a function within a new AsyncLocalStorage context
 */
export function runWithContext<T>(context: RequestContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Run an async function within a context that extends the current one
 */
export async function runWithContextAsync<T>(
  context: Partial<RequestContext>,
  fn: () => Promise<T>
): Promise<T> {
  const merged: RequestContext = {
    ...getContext(),
    ...context,
    correlationId: context.correlationId || getCorrelationId(),
  };
  return asyncLocalStorage.run(merged, fn);
}
