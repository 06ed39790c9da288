import express, {type NextFunction, type Request, type Response} from 'express';
import {trace} from '@opentelemetry/api';
import {
  AttributeResolutionError,
  OpenTelemetryBackend,
  createLogger,
  propagationHeaders,
  withTracing,
} from 'request-trace';

import {NotFoundError} from './errors';
import {store} from './store';
import {initTelemetry} from './telemetry';
import {attributes, hooks, requestAttributes} from './tracing';

const SERVICE_NAME = 'users-api';

export const logger = createLogger({name: SERVICE_NAME});

export function createApp() {
  const backend = new OpenTelemetryBackend(trace.getTracer(SERVICE_NAME));
  const app = express();

  app.use(
    withTracing({
      serviceName: SERVICE_NAME,
      backend,
      logger,
      hooks,
      attributes,
      owner: requestAttributes,
    }),
  );

  // GET /api/users/:id
  app.get('/api/users/:id', (req: Request, res: Response) => {
    const user = store.getById(req.params.id);
    if (!user) {
      throw new NotFoundError('User not found');
    }

    logger.info('user loaded', {user_id: user.id});
    res.json(user);
  });

  // GET /api/users/:id/orders - shows the headers a call to the orders service would carry
  app.get('/api/users/:id/orders', (req: Request, res: Response) => {
    res.json({userId: req.params.id, forward: propagationHeaders(backend)});
  });

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    switch (true) {
      case err instanceof NotFoundError:
        return res.status(404).json({error: err.message});
      case err instanceof AttributeResolutionError:
        logger.error('misconfigured span attribute', {error: err.message});
        return res.status(500).json({error: 'Internal server error'});
      default:
        logger.error('unhandled error', {error: err.message});
        return res.status(500).json({error: 'Internal server error'});
    }
  });

  return app;
}

// Start the server unless running under tests
if (process.env.NODE_ENV !== 'test' && !process.env.VITEST) {
  initTelemetry(logger);

  const port = Number(process.env.PORT) || 3000;
  createApp().listen(port, () => {
    logger.info('users-api listening', {url: `http://localhost:${port}`});
  });
}
