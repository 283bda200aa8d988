import { AsyncLocalStorage } from "async_hooks";

export type TraceContext = {
  synthesisId?: string;
  operation?: string;
  attempt?: number;
};

const storage = new AsyncLocalStorage<TraceContext>();

/**
 * Run `fn` with `ctx` layered over the enclosing context. Every trace event
 * emitted inside, including from the model client, carries these fields.
 */
export function runWithTraceContext<T>(ctx: TraceContext, fn: () => Promise<T>): Promise<T> {
  return storage.run({ ...storage.getStore(), ...ctx }, fn);
}

export function currentTraceContext(): Readonly<TraceContext> {
  return storage.getStore() ?? {};
}

// Each synthesis owns its store, so this only touches the current synthesis.
export function markTraceAttempt(attempt: number): void {
  const store = storage.getStore();
  if (store) store.attempt = attempt;
}
