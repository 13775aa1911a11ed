import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export interface CorrelationContext {
  correlationId: string;
}

const storage = new AsyncLocalStorage<CorrelationContext>();

export function getCorrelationId(): string | undefined {
  return storage.getStore()?.correlationId;
}

export function generateCorrelationId(): string {
  return randomUUID();
}

/**
 * Runs `fn` with `correlationId` as the active correlation id. Requests sent
 * from inside `fn`, including from promises it creates, carry the id.
 */
export function runWithCorrelationId<T>(correlationId: string, fn: () => T): T {
  if (getCorrelationId() === correlationId) {
    return fn();
  }
  return storage.run({ correlationId }, fn);
}
