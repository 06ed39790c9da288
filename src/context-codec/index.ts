export {TRACE_CONTEXT_HEADER, encode, decode, isSampled, isValidTraceContext} from './codec';
