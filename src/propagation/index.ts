export {propagationHeaders, type ContextSource} from './propagation';
