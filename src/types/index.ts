export * from './message.types';
export * from './source.types';
export * from './metrics.types';
export * from './analysis.types';
