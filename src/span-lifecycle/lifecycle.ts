import type {Logger} from '../logging';
import type {SpanAttributes, SpanStatus, TraceContext} from '../types';
import type {ActiveSpan, TracingBackend} from './types';

/**
 * Starts and finishes the span of a single request.
 *
 * Holds no per-request state: the span handle lives in the caller's closure,
 * so concurrent requests share nothing here.
 */
export class SpanLifecycle {
  private readonly backend: TracingBackend;

  private readonly logger: Logger;

  constructor(backend: TracingBackend, logger: Logger) {
    this.backend = backend;
    this.logger = logger;
  }

  /**
   * Starts the request span: a child of `parent` when there is one, a new root trace otherwise.
   */
  startSpan(name: string, attributes: SpanAttributes, parent?: TraceContext): ActiveSpan {
    const span = this.backend.startSpan(name, attributes, parent);

    this.logger.debug('span started', {
      span_name: name,
      parent_span_id: parent ? parent.spanId : null,
    });

    return span;
  }

  /**
   * Reports `status` on the span, then closes it. Call once per span.
   */
  finish(span: ActiveSpan, status: SpanStatus) {
    span.setStatus(status);
    span.end();

    this.logger.debug('span finished', {
      trace_id: span.context.traceId,
      span_id: span.context.spanId,
      status_code: status.code,
    });
  }

  currentContext(): TraceContext | undefined {
    return this.backend.currentContext();
  }
}
