import { createHash } from 'node:crypto';
import { fail, ok, Result } from '../common/errors';
import { readString } from './params';
import { Operator, OperatorParams } from './types';

export const HASH_TYPES = ['sha256', 'sha512', 'md5'] as const;
export type HashType = (typeof HASH_TYPES)[number];

function isHashType(value: string): value is HashType {
  return HASH_TYPES.some((type) => type === value);
}

function resolveHashType(params: OperatorParams): Result<HashType> {
  const hashType = readString(params, 'hashType', 'hash');
  if (!hashType.ok) {
    return hashType;
  }
  if (hashType.value === undefined) {
    return ok('sha256');
  }
  if (!isHashType(hashType.value)) {
    return fail(`Parameter hashType value ${hashType.value} is not in ${HASH_TYPES.join(', ')}`, {
      field: 'hashType',
      expected: HASH_TYPES.join(' | '),
      actual: hashType.value,
    });
  }
  return ok(hashType.value);
}

/** Hex digest of the UTF-8 bytes of the slice. */
export class HashOperator implements Operator {
  readonly name = 'hash';
  readonly kind = 'irreversible';
  readonly direction = 'anonymize';

  validate(params: OperatorParams): Result<void> {
    const hashType = resolveHashType(params);
    return hashType.ok ? ok(undefined) : hashType;
  }

  operate(text: string, params: OperatorParams): Result<string> {
    const hashType = resolveHashType(params);
    if (!hashType.ok) {
      return hashType;
    }
    return ok(createHash(hashType.value).update(text, 'utf8').digest('hex'));
  }
}
