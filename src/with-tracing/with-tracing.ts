import type {ActiveSpan, TracingHooks} from '../span-lifecycle';
import type {SpanAttributes, SpanStatus} from '../types';
import type {TracingConfig} from './types';
import type {NextFunction, Request, RequestHandler, Response} from 'express';

import {trace} from '@opentelemetry/api';

import {applyAttributePlan, compileAttributes} from '../attributes';
import {TRACE_CONTEXT_HEADER, decode, encode} from '../context-codec';
import {bindLoggingContext, createLogger} from '../logging';
import {OpenTelemetryBackend, SpanLifecycle, StatusCode, resolveHooks} from '../span-lifecycle';
import {extractMessage} from '../utils';

/** Status reported when the connection closes before the response was sent. */
export const ABORTED_STATUS = {code: StatusCode.CANCELLED, message: 'request aborted'};

/**
 * @internal Calls `done` once the response is over: on `finish` when it was sent,
 * on `close` when the connection went away first. Whichever comes first wins.
 */
function onResponseDone(res: Response, done: (aborted: boolean) => void) {
  let called = false;

  const complete = (aborted: boolean) => {
    if (called) {
      return;
    }
    called = true;
    res.off('finish', onFinish);
    res.off('close', onClose);
    done(aborted);
  };
  const onFinish = () => complete(false);
  const onClose = () => complete(!res.writableFinished);

  res.once('finish', onFinish);
  res.once('close', onClose);
}

/**
 * Creates an Express middleware that traces every request it sees.
 *
 * Per request it:
 * - continues the trace from the inbound `traceparent` header, or starts a new one
 *   when the header is absent or invalid;
 * - starts a server span named by `hooks.spanName` with the configured attributes;
 * - binds `trace_id`, `span_id` and `trace_options` into the logging metadata of the request;
 * - writes the context of the new span into the `traceparent` response header;
 * - finishes the span exactly once, with `hooks.spanStatus`, when the response is sent,
 *   or as `CANCELLED` when the client disconnects first.
 *
 * An attribute resolver or span naming hook that throws fails the request through `next(error)`.
 * A failing backend does not: the request goes on untraced, with a warning logged the first time.
 *
 * @throws {Error} If `serviceName` is empty
 * @throws {AttributeResolutionError} If an attribute source names no function
 *
 * @example
 * ```typescript
 * app.use(withTracing({
 *   serviceName: 'users-api',
 *   owner: {method: (req: Request) => req.method},
 *   attributes: ['method', {module: geo, fn: 'region'}],
 * }));
 * ```
 */
export function withTracing(config: TracingConfig): RequestHandler {
  if (
    !config.serviceName ||
    typeof config.serviceName !== 'string' ||
    config.serviceName.trim().length === 0
  ) {
    throw new Error('withTracing: serviceName must be a non-empty string');
  }

  const logger = config.logger || createLogger({name: config.serviceName});
  const backend = config.backend || new OpenTelemetryBackend(trace.getTracer(config.serviceName));
  const lifecycle = new SpanLifecycle(backend, logger);
  const hooks: TracingHooks = resolveHooks(config.hooks);
  const plan = compileAttributes(config.attributes, config.owner);

  let unavailableReported = false;
  // Warns on the first failure to start a span, then logs later ones at debug level.
  const reportUnavailable = (error: unknown) => {
    const fields = {error: extractMessage(error)};
    if (unavailableReported) {
      logger.debug('tracing unavailable, handling request without a span', fields);
      return;
    }
    unavailableReported = true;
    logger.warn('tracing unavailable, handling request without a span', fields);
  };

  const finalize = (span: ActiveSpan, req: Request, res: Response) =>
    onResponseDone(res, aborted => {
      const ids = {trace_id: span.context.traceId, span_id: span.context.spanId};

      let status: SpanStatus = ABORTED_STATUS;
      if (!aborted) {
        try {
          status = hooks.spanStatus(req, res);
        } catch (error) {
          logger.warn('span status hook failed', {...ids, error: extractMessage(error)});
          status = {code: StatusCode.UNKNOWN, message: extractMessage(error)};
        }
      }

      try {
        lifecycle.finish(span, status);
      } catch (error) {
        logger.warn('failed to finish request span', {...ids, error: extractMessage(error)});
      }
    });

  return function tracingMiddleware(req: Request, res: Response, next: NextFunction) {
    const parent = decode(req.headers[TRACE_CONTEXT_HEADER]);

    let name: string;
    let attributes: SpanAttributes;
    try {
      name = hooks.spanName(req);
      attributes = applyAttributePlan(req, plan);
    } catch (error) {
      next(error);
      return;
    }

    let span: ActiveSpan;
    try {
      span = lifecycle.startSpan(name, attributes, parent);
    } catch (error) {
      reportUnavailable(error);
      next();
      return;
    }

    bindLoggingContext(span.context, () => {
      res.setHeader(TRACE_CONTEXT_HEADER, encode(span.context));
      finalize(span, req, res);
      span.run(() => next());
    });
  };
}
