import type {TraceContext} from '../types';

import {AsyncLocalStorage} from 'node:async_hooks';

/** Key-value pairs attached to every log line emitted within a request. */
export type LogMetadata = Readonly<Record<string, string | number | boolean>>;

// One store per async execution chain, so concurrent requests never share metadata.
const storage = new AsyncLocalStorage<LogMetadata>();

export function getLogMetadata(): LogMetadata {
  return storage.getStore() || {};
}

/**
 * Runs `fn` with `metadata` merged over the metadata of the enclosing scope.
 * The enclosing scope is left untouched once `fn` returns.
 */
export function withLogMetadata<T>(metadata: LogMetadata, fn: () => T): T {
  return storage.run({...getLogMetadata(), ...metadata}, fn);
}

/**
 * Logging metadata for a trace context: `trace_id` (32 hex digits),
 * `span_id` (16 hex digits) and the raw `trace_options` flags.
 */
export function traceMetadata(ctx: TraceContext): LogMetadata {
  return {
    trace_id: ctx.traceId.toLowerCase().padStart(32, '0'),
    span_id: ctx.spanId.toLowerCase().padStart(16, '0'),
    trace_options: ctx.traceOptions,
  };
}

/**
 * Runs `fn` with the ids of `ctx` bound into the logging metadata, so every line
 * logged while `fn` (and anything it schedules) runs carries them.
 */
export function bindLoggingContext<T>(ctx: TraceContext, fn: () => T): T {
  return withLogMetadata(traceMetadata(ctx), fn);
}
