/**
 * Trace context carried across process boundaries.
 *
 * - `traceId` - 128-bit trace id, 32 lowercase hex digits
 * - `spanId` - 64-bit span id, 16 lowercase hex digits
 * - `traceOptions` - 8-bit trace flags (`0x01` is "sampled")
 */
export type TraceContext = {
  readonly traceId: string;
  readonly spanId: string;
  readonly traceOptions: number;
};

/**
 * Span status reported when a request completes.
 * `code` is one of the canonical {@link StatusCode} values.
 */
export type SpanStatus = {
  code: number;
  message: string;
};

/** Attributes attached to a request span. */
export type SpanAttributes = Record<string, string>;
