// /src/lib/requestId/requestId.ts
// Request-scoped correlation id (server-only).

import { AsyncLocalStorage } from "node:async_hooks";
import { randomUUID } from "crypto";

const storage = new AsyncLocalStorage<string>();

/** Opaque, unique in practice. No format is guaranteed to callers. */
export function generateRequestId(): string {
  return randomUUID();
}

/**
 * Run `fn` with `requestId` as the current request's id.
 * Nested calls shadow the outer id for their duration only.
 */
export function runWithRequestId<T>(requestId: string, fn: () => T): T {
  return storage.run(requestId, fn);
}

/** Id of the request being handled, or undefined outside runWithRequestId. */
export function getRequestId(): string | undefined {
  return storage.getStore();
}
