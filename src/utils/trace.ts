import type { TraceEvent } from "./traceBus";
import { publishTrace } from "./traceBus";
import { currentTraceContext } from "./traceContext";

export type TraceFields = Record<string, unknown>;

const TRACE_PREFIX = "[FALLBACK_TRACE]";
const TEXT_LIMIT = 2_000;
const FULL_TEXT_LIMIT = 20_000;

export function isTraceEnabled(): boolean {
  return process.env.FALLBACK_TRACE === "1";
}

function textLimit(): number {
  return process.env.FALLBACK_TRACE_FULL === "1" ? FULL_TEXT_LIMIT : TEXT_LIMIT;
}

export function truncate(text: string, maxLen: number): string {
  if (text.length <= maxLen) return text;
  return `${text.slice(0, maxLen)}…(truncated, len=${text.length})`;
}

/**
 * Emit one trace event. Listeners on the trace bus always receive it; the
 * console line is printed only with FALLBACK_TRACE=1.
 */
export function trace(event: string, fields: TraceFields = {}): void {
  const { synthesisId, operation, attempt } = currentTraceContext();
  const payload: TraceEvent = {
    ts: new Date().toISOString(),
    event,
    ...(synthesisId === undefined ? {} : { synthesisId }),
    ...(operation === undefined ? {} : { operation }),
    ...(attempt === undefined ? {} : { attempt }),
    ...fields,
  };

  publishTrace(payload);
  if (isTraceEnabled()) {
    console.log(`${TRACE_PREFIX} ${JSON.stringify(payload)}`);
  }
}

export function traceText(event: string, text: string, opts: { maxLen?: number; extra?: TraceFields } = {}): void {
  trace(event, { ...opts.extra, text: truncate(text, opts.maxLen ?? textLimit()), chars: text.length });
}
