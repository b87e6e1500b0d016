export * from './types';
export * from './dispatcher';
export * from './rewriter';
export * from './anonymizer';
export * from './deanonymizer';
