export type * from './types';

export {
  AttributeResolutionError,
  compileAttributes,
  applyAttributePlan,
  resolveAttributes,
} from './resolve';
