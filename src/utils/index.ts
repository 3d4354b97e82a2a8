export * from './constants';
export * from './config';
export * from './date.utils';
export * from './errors';
export * from './file.utils';
export * from './text.utils';
