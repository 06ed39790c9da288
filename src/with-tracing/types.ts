import type {AttributeSpec} from '../attributes';
import type {Logger} from '../logging';
import type {TracingBackend, TracingHooks} from '../span-lifecycle';

/**
 * Configuration of the tracing middleware. Read once, when the middleware is created.
 *
 * @property serviceName - Names the default tracer and logger
 * @property backend - Where spans go. Defaults to the OpenTelemetry API tracer for `serviceName`
 * @property hooks - Custom span naming and/or status; missing members use {@link defaultHooks}
 * @property attributes - Request attributes to attach to every span
 * @property owner - Object holding the functions named by local attribute sources
 * @property logger - Defaults to a JSON console logger named after the service
 */
export type TracingConfig = {
  serviceName: string;
  backend?: TracingBackend;
  hooks?: Partial<TracingHooks>;
  attributes?: AttributeSpec;
  owner?: object;
  logger?: Logger;
};
