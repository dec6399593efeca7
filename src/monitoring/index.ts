export * from './types';
export * from './store';
export * from './queue';
export * from './sampler';
export * from './collector';
export * from './instrumentation';
export * from './analytics';
