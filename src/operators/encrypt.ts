import { fail, ok, Result } from '../common/errors';
import { decrypt, encrypt, isValidKeySize } from '../crypto';
import { requireString } from './params';
import { Operator, OperatorParams } from './types';

/** Shared key check of the encrypt and decrypt operators. */
export function readKey(params: OperatorParams, operator: string): Result<string> {
  const key = requireString(params, 'key', operator);
  if (!key.ok) {
    return key;
  }
  if (!isValidKeySize(key.value)) {
    return fail('Invalid input, key must be of length 128, 192 or 256 bits', {
      field: 'key',
      expected: '16, 24 or 32 bytes',
      actual: Buffer.byteLength(key.value, 'utf8'),
    });
  }
  return key;
}

export class EncryptOperator implements Operator {
  readonly name = 'encrypt';
  readonly kind = 'reversible';
  readonly direction = 'anonymize';

  validate(params: OperatorParams): Result<void> {
    const key = readKey(params, this.name);
    return key.ok ? ok(undefined) : key;
  }

  operate(text: string, params: OperatorParams): Result<string> {
    const key = readKey(params, this.name);
    return key.ok ? encrypt(key.value, text) : key;
  }
}

/** Reverses {@link EncryptOperator} given the same key. */
export class DecryptOperator implements Operator {
  readonly name = 'decrypt';
  readonly kind = 'reversible';
  readonly direction = 'deanonymize';

  validate(params: OperatorParams): Result<void> {
    const key = readKey(params, this.name);
    return key.ok ? ok(undefined) : key;
  }

  operate(text: string, params: OperatorParams): Result<string> {
    const key = readKey(params, this.name);
    return key.ok ? decrypt(key.value, text) : key;
  }
}
