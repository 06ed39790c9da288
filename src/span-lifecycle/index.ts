export type * from './types';

export {StatusCode, httpStatusToTraceStatus} from './status';
export {OpenTelemetryBackend, TracingUnavailableError, STATUS_CODE_ATTRIBUTE} from './backend';
export {SpanLifecycle} from './lifecycle';
export {defaultHooks, resolveHooks} from './hooks';
