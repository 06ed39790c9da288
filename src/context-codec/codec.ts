import type {TraceContext} from '../types';

/**
 * Name of the propagation header (W3C Trace Context).
 * Header names are case-insensitive on the wire; this is the canonical form.
 */
export const TRACE_CONTEXT_HEADER = 'traceparent';

const VERSION = '00';

// version-traceid-spanid-flags
const HEADER_REGEX = /^([0-9a-f]{2})-([0-9a-f]{32})-([0-9a-f]{16})-([0-9a-f]{2})$/i;

const INVALID_TRACE_ID = '0'.repeat(32);
const INVALID_SPAN_ID = '0'.repeat(16);

/**
 * Checks that a context carries non-zero ids of the right width and flags that fit a byte.
 */
export function isValidTraceContext(ctx: TraceContext): boolean {
  return (
    /^[0-9a-f]{32}$/.test(ctx.traceId) &&
    /^[0-9a-f]{16}$/.test(ctx.spanId) &&
    ctx.traceId !== INVALID_TRACE_ID &&
    ctx.spanId !== INVALID_SPAN_ID &&
    Number.isInteger(ctx.traceOptions) &&
    ctx.traceOptions >= 0 &&
    ctx.traceOptions <= 0xff
  );
}

export function isSampled(ctx: TraceContext): boolean {
  return (ctx.traceOptions & 0x01) === 0x01;
}

/**
 * Renders a context as a `traceparent` header value.
 *
 * @example
 * ```typescript
 * encode({traceId: '4bf92f3577b34da6a3ce929d0e0e4736', spanId: '00f067aa0ba902b7', traceOptions: 1});
 * // '00-4bf92f3577b34da6a3ce929d0e0e4736-00f067aa0ba902b7-01'
 * ```
 */
export function encode(ctx: TraceContext): string {
  const flags = ctx.traceOptions.toString(16).padStart(2, '0');
  return `${VERSION}-${ctx.traceId}-${ctx.spanId}-${flags}`;
}

/**
 * Parses a `traceparent` header value as Node delivers it.
 *
 * Returns `undefined` for an absent header, more than one header value, a malformed
 * value, an unknown version or an all-zero id. Never throws.
 */
export function decode(value: string | string[] | undefined): TraceContext | undefined {
  if (Array.isArray(value)) {
    if (value.length !== 1) {
      return undefined;
    }
    value = value[0];
  }

  if (typeof value !== 'string') {
    return undefined;
  }

  const match = HEADER_REGEX.exec(value);
  if (!match) {
    return undefined;
  }

  const [, version, traceId, spanId, flags] = match;
  if (version !== VERSION) {
    return undefined;
  }

  const ctx: TraceContext = {
    traceId: traceId.toLowerCase(),
    spanId: spanId.toLowerCase(),
    traceOptions: parseInt(flags, 16),
  };

  return isValidTraceContext(ctx) ? ctx : undefined;
}
