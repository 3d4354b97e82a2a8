export * from './message.types';
export type * from './config.types';
export type * from './metrics.types';
