import { AsyncLocalStorage } from "node:async_hooks";
import { randomUUID } from "node:crypto";
import { ValidationError } from "../errors";

/**
 * Correlation scope container.
 * AsyncLocalStorage-backed so concurrent requests never see each other's ids.
 *
 * The request boundary calls runWithCorrelation(); code below it only
 * reads. setCorrelationId() exists for callers that learn the id after the
 * scope opened (e.g. once a header has been parsed).
 */

interface CorrelationStore {
  correlationId?: string;
}

const storage = new AsyncLocalStorage<CorrelationStore>();

function assertId(id: unknown): asserts id is string {
  if (typeof id !== "string" || id.trim() === "") {
    throw new ValidationError("correlationId must be a non-empty string");
  }
}

/**
 * Runs `fn` in a fresh correlation scope. Pass undefined to let the first
 * log call in the scope generate an id.
 */
export function runWithCorrelation<T>(
  correlationId: string | undefined,
  fn: () => T
): T {
  if (correlationId !== undefined) assertId(correlationId);
  return storage.run({ correlationId }, fn);
}

/**
 * Binds `correlationId` to the current scope. Outside any scope, binds it
 * to the current execution and the async work it starts.
 */
export function setCorrelationId(correlationId: string): void {
  assertId(correlationId);
  const store = storage.getStore();
  if (store) {
    store.correlationId = correlationId;
  } else {
    storage.enterWith({ correlationId });
  }
}

export function getCorrelationId(): string | undefined {
  return storage.getStore()?.correlationId;
}

/**
 * The scope's id. When none was set, a UUID is generated and remembered in
 * the active scope; outside any scope each call gets a fresh one.
 */
export function resolveCorrelationId(): string {
  const store = storage.getStore();
  if (store?.correlationId) return store.correlationId;

  const generated = randomUUID();
  if (store) store.correlationId = generated;
  return generated;
}
