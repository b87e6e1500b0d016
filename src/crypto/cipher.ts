import { createCipheriv, createDecipheriv, randomBytes } from 'node:crypto';
import type { CipherGCMTypes } from 'node:crypto';
import { fail, ok, Result } from '../common/errors';

const IV_LENGTH = 12;
const TAG_LENGTH = 16;

const ALGORITHMS: Record<number, CipherGCMTypes> = {
  16: 'aes-128-gcm',
  24: 'aes-192-gcm',
  32: 'aes-256-gcm',
};

export type CipherKey = Buffer | string;

function toKeyBuffer(key: CipherKey): Buffer {
  return typeof key === 'string' ? Buffer.from(key, 'utf8') : key;
}

function algorithmFor(key: Buffer): CipherGCMTypes | undefined {
  return ALGORITHMS[key.length];
}

/** String keys are measured by their UTF-8 encoding. */
export function isValidKeySize(key: CipherKey): boolean {
  return algorithmFor(toKeyBuffer(key)) !== undefined;
}

/**
 * Token layout, base64 encoded: iv (12 bytes) | ciphertext | auth tag (16 bytes).
 */
export function encrypt(key: CipherKey, plaintext: string): Result<string> {
  const keyBuffer = toKeyBuffer(key);
  const algorithm = algorithmFor(keyBuffer);
  if (!algorithm) {
    return fail('Invalid input, key must be of length 128, 192 or 256 bits', {
      field: 'key',
      expected: '16, 24 or 32 bytes',
      actual: keyBuffer.length,
    });
  }
  const iv = randomBytes(IV_LENGTH);
  const cipher = createCipheriv(algorithm, keyBuffer, iv, { authTagLength: TAG_LENGTH });
  const encrypted = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
  return ok(Buffer.concat([iv, encrypted, cipher.getAuthTag()]).toString('base64'));
}

export function decrypt(key: CipherKey, token: string): Result<string> {
  const keyBuffer = toKeyBuffer(key);
  const algorithm = algorithmFor(keyBuffer);
  if (!algorithm) {
    return fail('Invalid input, key must be of length 128, 192 or 256 bits', {
      field: 'key',
      expected: '16, 24 or 32 bytes',
      actual: keyBuffer.length,
    });
  }
  if (!/^[A-Za-z0-9+/]*={0,2}$/.test(token)) {
    return fail('Invalid input, token is not valid base64', { field: 'text', expected: 'base64 token' });
  }
  const payload = Buffer.from(token, 'base64');
  if (payload.length < IV_LENGTH + TAG_LENGTH) {
    return fail('Invalid input, token is too short to be decrypted', {
      field: 'text',
      expected: `at least ${IV_LENGTH + TAG_LENGTH} bytes`,
      actual: payload.length,
    });
  }

  const iv = payload.subarray(0, IV_LENGTH);
  const tag = payload.subarray(payload.length - TAG_LENGTH);
  const data = payload.subarray(IV_LENGTH, payload.length - TAG_LENGTH);
  const decipher = createDecipheriv(algorithm, keyBuffer, iv, { authTagLength: TAG_LENGTH });
  decipher.setAuthTag(tag);
  try {
    return ok(Buffer.concat([decipher.update(data), decipher.final()]).toString('utf8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return fail(`Decryption failed: ${message}`, {
      field: 'key',
      expected: 'the key used for encryption',
    });
  }
}
