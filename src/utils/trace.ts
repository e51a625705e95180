import { getConfig } from "../config";
import { traceContextFields } from "./traceContext";

type TraceData = Record<string, unknown>;

const TRACE_PREFIX = "[DETECTIVE_TRACE]";

export function isTraceEnabled(): boolean {
  return getConfig().DETECTIVE_TRACE;
}

export function truncate(text: string, maxLen: number): string {
  if (text.length <= maxLen) return text;
  return `${text.slice(0, maxLen)}...(truncated, len=${text.length})`;
}

/**
 * Emits one grep-able JSON line when DETECTIVE_TRACE=1. Request and player ids
 * come from the active trace context unless the caller passes its own.
 */
export function trace(event: string, data: TraceData = {}): void {
  if (!isTraceEnabled()) return;
  const payload: TraceData = {
    ts: new Date().toISOString(),
    event,
    ...traceContextFields(),
    ...data,
  };
  console.log(`${TRACE_PREFIX} ${JSON.stringify(payload)}`);
}

/** Traces a prompt or model response, clipped unless DETECTIVE_TRACE_FULL=1. */
export function traceText(event: string, text: string, maxLen?: number): void {
  if (!isTraceEnabled()) return;
  const limit = maxLen ?? (getConfig().DETECTIVE_TRACE_FULL ? 20_000 : 2_000);
  trace(event, { text: truncate(text, limit), len: text.length });
}
