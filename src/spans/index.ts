export * from './types';
export * from './reconciler';
export * from './parse';
