import type {Request, Response} from 'express';
import type {TracingHooks} from './types';

import {httpStatusToTraceStatus} from './status';

/**
 * Default hooks: the span is named after the request path (no host, no query string)
 * and its status follows the response code with an empty message.
 */
export const defaultHooks: TracingHooks = {
  spanName: (req: Request) => req.path,
  spanStatus: (_req: Request, res: Response) => ({
    code: httpStatusToTraceStatus(res.statusCode),
    message: '',
  }),
};

/**
 * Fills the hooks a service does not override with the defaults.
 */
export function resolveHooks(custom: Partial<TracingHooks> = {}): TracingHooks {
  return {
    spanName: custom.spanName || defaultHooks.spanName,
    spanStatus: custom.spanStatus || defaultHooks.spanStatus,
  };
}
