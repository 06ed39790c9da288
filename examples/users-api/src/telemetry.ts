/**
 * OpenTelemetry SDK initialization
 *
 * By default, traces are exported to the OTLP endpoint (http://localhost:4318/v1/traces).
 * The endpoint is configured via the OTEL_EXPORTER_OTLP_ENDPOINT environment variable.
 *
 * For local development, you can use Jaeger:
 * - Start Jaeger: docker run -d -p 16686:16686 -p 4318:4318 jaegertracing/all-in-one:latest
 * - View traces: http://localhost:16686
 */

import type {Logger} from 'request-trace';

import {NodeSDK} from '@opentelemetry/sdk-node';

let sdkInstance: NodeSDK | null = null;

/**
 * Starts the SDK once and shuts it down on SIGTERM.
 */
export function initTelemetry(logger: Logger) {
  if (sdkInstance) {
    return;
  }

  sdkInstance = new NodeSDK({serviceName: 'users-api'});
  sdkInstance.start();
  logger.info('OpenTelemetry SDK initialized');

  process.on('SIGTERM', () => {
    if (!sdkInstance) {
      return;
    }

    sdkInstance
      .shutdown()
      .then(() => logger.info('OpenTelemetry SDK shutdown'))
      .catch(error => logger.error('Error shutting down OpenTelemetry SDK', {error: String(error)}))
      .finally(() => process.exit(0));
  });
}
