import { AsyncLocalStorage } from "async_hooks";

/** Per-request ids stamped onto every trace line emitted while handling that request. */
export type TraceContext = {
  requestId?: string;
  playerId?: string;
};

const storage = new AsyncLocalStorage<TraceContext>();

// Works for sync and async callbacks alike; grading itself is synchronous.
export function withTraceContext<T>(ctx: TraceContext, fn: () => T): T {
  const parent = storage.getStore();
  return storage.run({ ...parent, ...ctx }, fn);
}

/** Context ids that are set, ready to spread into a log payload. */
export function traceContextFields(): Record<string, string> {
  const ctx = storage.getStore();
  const fields: Record<string, string> = {};
  if (ctx?.requestId) fields.requestId = ctx.requestId;
  if (ctx?.playerId) fields.playerId = ctx.playerId;
  return fields;
}
