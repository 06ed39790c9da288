import type {Request, Response} from 'express';

import {describe, expect, it} from 'vitest';

import {FakeBackend, captureLogs} from '../__tests__/fake-backend';
import {createLogger} from '../logging';

import {defaultHooks, resolveHooks} from './hooks';
import {SpanLifecycle} from './lifecycle';
import {StatusCode} from './status';

const parent = {
  traceId: '4bf92f3577b34da6a3ce929d0e0e4736',
  spanId: '00f067aa0ba902b7',
  traceOptions: 1,
};

function setup() {
  const backend = new FakeBackend();
  const {lines, sink} = captureLogs();
  const lifecycle = new SpanLifecycle(backend, createLogger({name: 'test', level: 'debug', sink}));

  return {backend, lifecycle, lines};
}

describe('SpanLifecycle', () => {
  it('should start a child span of the parent', () => {
    const {backend, lifecycle} = setup();

    const span = lifecycle.startSpan('/users/42', {method: 'GET'}, parent);

    expect(backend.spans).toHaveLength(1);
    expect(backend.spans[0]).toMatchObject({
      name: '/users/42',
      attributes: {method: 'GET'},
      parent,
    });
    expect(span.context).toEqual({
      traceId: parent.traceId,
      spanId: '0000000000000001',
      traceOptions: 1,
    });
  });

  it('should start a root span without parent', () => {
    const {backend, lifecycle} = setup();

    lifecycle.startSpan('/health', {});

    expect(backend.spans[0].parent).toBeUndefined();
  });

  it('should report status before ending', () => {
    const {backend, lifecycle} = setup();
    const span = lifecycle.startSpan('/users/42', {}, parent);

    lifecycle.finish(span, {code: StatusCode.NOT_FOUND, message: 'gone'});

    expect(backend.spans[0].statuses).toEqual([{code: StatusCode.NOT_FOUND, message: 'gone'}]);
    expect(backend.spans[0].ends).toBe(1);
  });

  it('should log span start and finish at debug level', () => {
    const {lifecycle, lines} = setup();
    const span = lifecycle.startSpan('/users/42', {}, parent);
    lifecycle.finish(span, {code: StatusCode.OK, message: ''});

    expect(lines).toMatchObject([
      {level: 'debug', msg: 'span started', span_name: '/users/42', parent_span_id: parent.spanId},
      {
        level: 'debug',
        msg: 'span finished',
        trace_id: parent.traceId,
        span_id: '0000000000000001',
        status_code: StatusCode.OK,
      },
    ]);
  });

  it('should read the current context from the backend', () => {
    const {lifecycle} = setup();
    const span = lifecycle.startSpan('/users/42', {});

    expect(span.run(() => lifecycle.currentContext())).toEqual(span.context);
    expect(lifecycle.currentContext()).toBeUndefined();
  });
});

describe('hooks', () => {
  const req = {path: '/users/42'} as unknown as Request;

  it('should name spans after the request path', () => {
    expect(defaultHooks.spanName(req)).toBe('/users/42');
  });

  it('should derive status from the response code with an empty message', () => {
    const status = (statusCode: number) =>
      defaultHooks.spanStatus(req, {statusCode} as unknown as Response);

    expect(status(200)).toEqual({code: StatusCode.OK, message: ''});
    expect(status(404)).toEqual({code: StatusCode.NOT_FOUND, message: ''});
    expect(status(500)).toEqual({code: StatusCode.UNKNOWN, message: ''});
  });

  it('should keep defaults for hooks that are not overridden', () => {
    const spanName = (r: Request) => `HTTP ${r.path}`;
    const hooks = resolveHooks({spanName});

    expect(hooks.spanName(req)).toBe('HTTP /users/42');
    expect(hooks.spanStatus).toBe(defaultHooks.spanStatus);
    expect(resolveHooks()).toEqual(defaultHooks);
  });
});
