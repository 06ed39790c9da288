export type * from './types';

export * from './context-codec';
export * from './attributes';
export * from './logging';
export * from './span-lifecycle';
export * from './propagation';
export * from './with-tracing';
