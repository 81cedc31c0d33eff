export * from './types';
export * from './errors';
export * from './constants';
export * from './utils';
export * from './schema';
export * from './query';
export { toNumberedPlaceholders } from './dialect/placeholders';
