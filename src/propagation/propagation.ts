import type {TraceContext} from '../types';

import {TRACE_CONTEXT_HEADER, encode} from '../context-codec';

/** Anything that knows the current trace context, e.g. a `TracingBackend`. */
export type ContextSource = {
  currentContext(): TraceContext | undefined;
};

/**
 * Headers that continue the current trace in an outgoing request.
 * Empty outside a span.
 *
 * @example
 * ```typescript
 * await fetch(url, {headers: {...propagationHeaders(backend), accept: 'application/json'}});
 * ```
 */
export function propagationHeaders(source: ContextSource): Record<string, string> {
  const ctx = source.currentContext();
  return ctx ? {[TRACE_CONTEXT_HEADER]: encode(ctx)} : {};
}
