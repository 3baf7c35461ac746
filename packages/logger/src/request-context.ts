/**
 * @fileoverview Request context propagation using AsyncLocalStorage.
 *
 * One CLI invocation runs inside one context, so every log line of a batch,
 * including those from concurrent ticker chains, carries the same request id.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export interface RequestContext {
  /** Unique request identifier (UUID v4) */
  request_id: string;
  [key: string]: unknown;
}

const storage = new AsyncLocalStorage<RequestContext>();

/**
 * Current context, or undefined outside {@link withRequestContext}.
 */
export function getRequestContext(): RequestContext | undefined {
  return storage.getStore();
}

export function getRequestId(): string | undefined {
  return storage.getStore()?.request_id;
}

/**
 * Run `fn` inside a new request context.
 *
 * @param fn - Work to run; sync or async
 * @param requestId - Id to use; a UUID is generated when omitted
 * @param additionalContext - Extra fields stored alongside the id; log entries
 *   written inside the context carry them too
 *
 * @example
 * ```typescript
 * await withRequestContext(async () => {
 *   logger.info('Fetching series'); // includes request_id
 *   await runBatch(options);
 * });
 * ```
 */
export async function withRequestContext<T>(
  fn: () => Promise<T> | T,
  requestId?: string,
  additionalContext?: Record<string, unknown>
): Promise<T> {
  const context: RequestContext = {
    ...additionalContext,
    request_id: requestId || randomUUID(),
  };

  return storage.run(context, fn);
}
