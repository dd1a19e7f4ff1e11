export * from './constants';
export * from './date.utils';
export * from './errors';
export * from './file.utils';
export * from './format.utils';
export * from './stats.utils';
export * from './text.utils';
