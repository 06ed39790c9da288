import type {SpanAttributes, SpanStatus, TraceContext} from '../types';
import type {ActiveSpan, TracingBackend} from './types';
import type {Span, SpanContext, Tracer} from '@opentelemetry/api';

import {
  ROOT_CONTEXT,
  SpanKind,
  SpanStatusCode,
  context as otelContext,
  isSpanContextValid,
  trace,
} from '@opentelemetry/api';

import {StatusCode} from './status';

/** Attribute holding the canonical status code, which OpenTelemetry's status cannot express. */
export const STATUS_CODE_ATTRIBUTE = 'opencensus.status_code';

/**
 * Raised when the tracer hands out spans without a context of their own:
 * an invalid one, or the parent's. That is what the API does when no SDK has been registered.
 */
export class TracingUnavailableError extends Error {
  constructor(
    message = 'Tracer returned no span context of its own. Register a TracerProvider (e.g. NodeSDK from @opentelemetry/sdk-node) before handling requests.',
  ) {
    super(message);
    this.name = 'TracingUnavailableError';
  }
}

function toSpanContext(ctx: TraceContext): SpanContext {
  return {
    traceId: ctx.traceId,
    spanId: ctx.spanId,
    traceFlags: ctx.traceOptions,
    isRemote: true,
  };
}

function fromSpanContext(spanContext: SpanContext): TraceContext {
  return {
    traceId: spanContext.traceId,
    spanId: spanContext.spanId,
    traceOptions: spanContext.traceFlags,
  };
}

class OpenTelemetrySpan implements ActiveSpan {
  readonly context: TraceContext;

  private readonly span: Span;

  constructor(span: Span) {
    this.span = span;
    this.context = fromSpanContext(span.spanContext());
  }

  setStatus({code, message}: SpanStatus) {
    this.span.setAttribute(STATUS_CODE_ATTRIBUTE, code);
    this.span.setStatus(
      code === StatusCode.OK ? {code: SpanStatusCode.OK} : {code: SpanStatusCode.ERROR, message},
    );
  }

  end() {
    if (this.span.isRecording()) {
      this.span.end();
    }
  }

  run<T>(fn: () => T): T {
    return otelContext.with(trace.setSpan(otelContext.active(), this.span), fn);
  }
}

/**
 * Tracing backend on top of the OpenTelemetry API.
 *
 * Request spans are `SERVER` spans. An inbound parent is installed as a remote span
 * context on an empty context, so a request either continues the caller's trace or
 * starts a new one, never an unrelated span that happens to be active.
 *
 * @example
 * ```typescript
 * const backend = new OpenTelemetryBackend(trace.getTracer('users-api'));
 * ```
 */
export class OpenTelemetryBackend implements TracingBackend {
  private readonly tracer: Tracer;

  constructor(tracer: Tracer) {
    this.tracer = tracer;
  }

  startSpan(name: string, attributes: SpanAttributes, parent?: TraceContext): ActiveSpan {
    const base = parent ? trace.setSpanContext(ROOT_CONTEXT, toSpanContext(parent)) : ROOT_CONTEXT;
    const span = this.tracer.startSpan(name, {kind: SpanKind.SERVER, attributes}, base);

    // Without an SDK the API returns the parent's own context instead of a child.
    const spanContext = span.spanContext();
    if (!isSpanContextValid(spanContext) || spanContext.spanId === parent?.spanId) {
      throw new TracingUnavailableError();
    }

    return new OpenTelemetrySpan(span);
  }

  currentContext(): TraceContext | undefined {
    const spanContext = trace.getActiveSpan()?.spanContext();
    if (!spanContext || !isSpanContextValid(spanContext)) {
      return undefined;
    }

    return fromSpanContext(spanContext);
  }
}
