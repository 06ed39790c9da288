export type * from './types';

export {withTracing, ABORTED_STATUS} from './with-tracing';
