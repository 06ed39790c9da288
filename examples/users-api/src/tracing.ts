import type {Request} from 'express';
import type {AttributeSpec, TracingHooks} from 'request-trace';

import {StatusCode, defaultHooks} from 'request-trace';

/**
 * Functions referenced by name from the attribute spec below.
 */
export const requestAttributes = {
  method: (req: Request) => req.method,
  route: (req: Request) => req.path.split('/').slice(0, 3).join('/'),
};

/**
 * Attributes read from headers set by the edge proxy.
 */
export const edge = {
  header: (req: Request, name: string, fallback: string) => req.get(name) ?? fallback,
  region: (req: Request) => req.get('x-edge-region') ?? 'local',
};

export const attributes: AttributeSpec = {
  'http.method': 'method',
  'http.route_prefix': 'route',
  'edge.region': {module: edge, fn: 'region'},
  'client.name': {module: edge, fn: 'header', args: ['x-client-name', 'anonymous']},
};

/**
 * Spans are named `METHOD /path`. A 404 from the users endpoint is an expected
 * outcome here, so it does not mark the span as failed.
 */
export const hooks: TracingHooks = {
  spanName: req => `${req.method} ${req.path}`,
  spanStatus: (req, res) => {
    if (res.statusCode === 404 && req.path.startsWith('/api/users/')) {
      return {code: StatusCode.OK, message: 'user not found'};
    }
    return defaultHooks.spanStatus(req, res);
  },
};
