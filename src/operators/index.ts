export * from './types';
export * from './catalog';
export { HashOperator, HASH_TYPES } from './hash';
export type { HashType } from './hash';
export { MaskOperator } from './mask';
export { RedactOperator } from './redact';
export { ReplaceOperator, placeholderFor } from './replace';
export { EncryptOperator, DecryptOperator } from './encrypt';
export * from './parse';
