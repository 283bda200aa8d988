export type TraceEvent = {
  ts: string;
  event: string;
  synthesisId?: string;
  operation?: string;
  attempt?: number;
  [field: string]: unknown;
};

export type TraceListener = (event: TraceEvent) => void;

const globalListeners = new Set<TraceListener>();
const scopedListeners = new Map<string, Set<TraceListener>>();

function deliver(listener: TraceListener, event: TraceEvent): void {
  try {
    listener(event);
  } catch (err) {
    console.warn("[FALLBACK_TRACE] listener failed:", err instanceof Error ? err.message : err);
  }
}

export function publishTrace(event: TraceEvent): void {
  for (const listener of globalListeners) deliver(listener, event);
  if (event.synthesisId === undefined) return;
  const scoped = scopedListeners.get(event.synthesisId);
  if (scoped) for (const listener of scoped) deliver(listener, event);
}

/**
 * Subscribe to every trace event, or only to one synthesis when
 * `synthesisId` is given. Returns the unsubscribe function.
 */
export function subscribeTrace(listener: TraceListener, synthesisId?: string): () => void {
  if (synthesisId === undefined) {
    globalListeners.add(listener);
    return () => {
      globalListeners.delete(listener);
    };
  }

  let scoped = scopedListeners.get(synthesisId);
  if (!scoped) {
    scoped = new Set();
    scopedListeners.set(synthesisId, scoped);
  }
  scoped.add(listener);
  return () => {
    const current = scopedListeners.get(synthesisId);
    if (!current) return;
    current.delete(listener);
    if (current.size === 0) scopedListeners.delete(synthesisId);
  };
}
