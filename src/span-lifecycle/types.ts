import type {SpanAttributes, SpanStatus, TraceContext} from '../types';
import type {Request, Response} from 'express';

/**
 * A started span owned by the tracing backend.
 */
export interface ActiveSpan {
  /** Context of this span; used for the response header and logging metadata. */
  readonly context: TraceContext;
  setStatus(status: SpanStatus): void;
  end(): void;
  /** Runs `fn` with this span as the backend's current span. */
  run<T>(fn: () => T): T;
}

/**
 * The tracing system spans are reported to. Batching and export are its concern.
 */
export interface TracingBackend {
  /**
   * Starts a span as a child of `parent`, or as the root of a new trace when there is none.
   */
  startSpan(name: string, attributes: SpanAttributes, parent?: TraceContext): ActiveSpan;
  /** Context of the span current in the calling scope, if any. */
  currentContext(): TraceContext | undefined;
}

/**
 * Per-service naming and status policy for request spans.
 *
 * @see defaultHooks
 */
export type TracingHooks = {
  spanName(req: Request): string;
  spanStatus(req: Request, res: Response): SpanStatus;
};
