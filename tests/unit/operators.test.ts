import { describe, it, expect } from 'vitest';
import { createHash } from 'node:crypto';
import {
  createOperatorCatalog,
  defaultCatalog,
  DecryptOperator,
  EncryptOperator,
  HashOperator,
  MaskOperator,
  Operator,
  parseOperatorConfigMap,
  RedactOperator,
  ReplaceOperator,
} from '../../src/operators';

const context = { entityType: 'PHONE_NUMBER' };

describe('Operator catalog', () => {
  it('lists operators by direction', () => {
    expect(defaultCatalog.list('anonymize')).toEqual(['hash', 'mask', 'redact', 'replace', 'encrypt']);
    expect(defaultCatalog.list('deanonymize')).toEqual(['decrypt']);
    expect(defaultCatalog.list()).toHaveLength(6);
  });

  it('is frozen after construction', () => {
    expect(Object.isFrozen(defaultCatalog)).toBe(true);
    expect(defaultCatalog.get('mask')?.kind).toBe('irreversible');
    expect(defaultCatalog.get('decrypt')?.kind).toBe('reversible');
    expect(defaultCatalog.has('fake')).toBe(false);
  });

  it('refuses duplicate operator names', () => {
    expect(() => createOperatorCatalog([new RedactOperator(), new RedactOperator()])).toThrow(
      'Operator "redact" is defined twice',
    );
  });
});

describe('hash', () => {
  const operator: Operator = new HashOperator();

  it('defaults to sha256 hex digests', () => {
    const expected = createHash('sha256').update('555-1234', 'utf8').digest('hex');
    expect(operator.operate('555-1234', {}, context)).toEqual({ ok: true, value: expected });
  });

  it('supports sha512 and md5', () => {
    expect(operator.operate('abc', { hashType: 'sha512' }, context)).toEqual({
      ok: true,
      value: createHash('sha512').update('abc').digest('hex'),
    });
    expect(operator.operate('abc', { hashType: 'md5' }, context)).toEqual({
      ok: true,
      value: createHash('md5').update('abc').digest('hex'),
    });
  });

  it('rejects unknown digest algorithms', () => {
    const result = operator.validate({ hashType: 'sha1' });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Parameter hashType value sha1 is not in sha256, sha512, md5');
      expect(result.error.field).toBe('hashType');
    }
  });
});

describe('mask', () => {
  const operator: Operator = new MaskOperator();

  it('masks from the start by default', () => {
    expect(operator.operate('REPLACE ME', { maskingChar: '*', charsToMask: 4 }, context)).toEqual({
      ok: true,
      value: '****ACE ME',
    });
  });

  it('masks from the end', () => {
    expect(operator.operate('REPLACE ME', { maskingChar: '#', charsToMask: 4, fromEnd: true }, context)).toEqual({
      ok: true,
      value: 'REPLAC####',
    });
  });

  it('masks the whole slice or nothing at the bounds', () => {
    expect(operator.operate('abc', { maskingChar: '*', charsToMask: 3 }, context)).toEqual({ ok: true, value: '***' });
    expect(operator.operate('abc', { maskingChar: '*', charsToMask: 0 }, context)).toEqual({ ok: true, value: 'abc' });
  });

  it('accepts a masking character outside the basic multilingual plane', () => {
    expect(operator.validate({ maskingChar: '🔒', charsToMask: 2 }).ok).toBe(true);
    expect(operator.operate('1234', { maskingChar: '🔒', charsToMask: 2 }, context)).toEqual({
      ok: true,
      value: '🔒🔒34',
    });
  });

  it('fails when asked to mask more characters than the slice holds', () => {
    const result = operator.operate('abc', { maskingChar: '*', charsToMask: 4 }, context);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Invalid input, charsToMask 4 exceeds the masked text length 3');
    }
  });

  it.each([
    [{ maskingChar: '**', charsToMask: 1 }, 'maskingChar'],
    [{ maskingChar: '', charsToMask: 1 }, 'maskingChar'],
    [{ charsToMask: 1 }, 'maskingChar'],
    [{ maskingChar: '*' }, 'charsToMask'],
    [{ maskingChar: '*', charsToMask: -1 }, 'charsToMask'],
    [{ maskingChar: '*', charsToMask: 1.5 }, 'charsToMask'],
    [{ maskingChar: '*', charsToMask: '2' }, 'charsToMask'],
    [{ maskingChar: '*', charsToMask: 2, fromEnd: 'yes' }, 'fromEnd'],
  ])('rejects %j', (params, field) => {
    const result = operator.validate(params);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.field).toBe(field);
    }
  });
});

describe('redact', () => {
  const operator: Operator = new RedactOperator();

  it('returns an empty string, also for an empty slice', () => {
    expect(operator.operate('REPLACE ME', {}, context)).toEqual({ ok: true, value: '' });
    expect(operator.operate('', {}, context)).toEqual({ ok: true, value: '' });
  });
});

describe('replace', () => {
  const operator: Operator = new ReplaceOperator();

  it('returns the configured value', () => {
    expect(operator.operate('555-1234', { newValue: 'a phone' }, context)).toEqual({ ok: true, value: 'a phone' });
  });

  it('falls back to the upper-cased entity type', () => {
    expect(operator.operate('x', {}, { entityType: 'ssn' })).toEqual({ ok: true, value: '<SSN>' });
  });

  it('accepts an empty replacement', () => {
    expect(operator.operate('x', { newValue: '' }, context)).toEqual({ ok: true, value: '' });
  });

  it('rejects non-string values', () => {
    const result = operator.validate({ newValue: 5 });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Invalid parameter value for newValue in replace, expected string but got number');
    }
  });
});

describe('encrypt and decrypt', () => {
  const encryptOperator: Operator = new EncryptOperator();
  const decryptOperator: Operator = new DecryptOperator();
  const key = 'sixteen byte key';

  it('round-trips through both operators', () => {
    const token = encryptOperator.operate('4111 1111', { key }, context);
    expect(token.ok).toBe(true);
    if (token.ok) {
      expect(token.value).not.toContain('4111');
      expect(decryptOperator.operate(token.value, { key }, context)).toEqual({ ok: true, value: '4111 1111' });
    }
  });

  it.each([
    [encryptOperator],
    [decryptOperator],
  ])('%o requires a key of an admitted size', (operator) => {
    const missing = operator.validate({});
    const short = operator.validate({ key: 'too short' });
    expect(missing.ok).toBe(false);
    expect(short.ok).toBe(false);
    if (!missing.ok && !short.ok) {
      expect(missing.error.message).toBe(`Expected parameter key for ${operator.name}`);
      expect(short.error.message).toBe('Invalid input, key must be of length 128, 192 or 256 bits');
      expect(short.error.actual).toBe(9);
    }
  });

  it('reports a wrong key as a failure', () => {
    const token = encryptOperator.operate('secret', { key }, context);
    expect(token.ok).toBe(true);
    if (token.ok) {
      expect(decryptOperator.operate(token.value, { key: 'another 16b key!' }, context).ok).toBe(false);
    }
  });
});

describe('parseOperatorConfigMap', () => {
  it('treats a missing mapping as empty', () => {
    expect(parseOperatorConfigMap(undefined)).toEqual({ ok: true, value: {} });
  });

  it('copies entries and defaults params', () => {
    expect(parseOperatorConfigMap({ SSN: { operatorName: 'redact' } })).toEqual({
      ok: true,
      value: { SSN: { operatorName: 'redact', params: {} } },
    });
  });

  it('keeps a __proto__ entry as plain data', () => {
    const result = parseOperatorConfigMap(JSON.parse('{"__proto__": {"operatorName": "hash"}}'));
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(Object.getPrototypeOf(result.value)).toBeNull();
      expect(Object.hasOwn(result.value, '__proto__')).toBe(true);
      expect(Object.hasOwn(result.value, 'operatorName')).toBe(false);
    }
  });

  it('names the entity of a malformed entry', () => {
    const result = parseOperatorConfigMap({ number: null });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe("Invalid operator data for 'number'");
    }
  });

  it('rejects params that are not a mapping', () => {
    const result = parseOperatorConfigMap({ SSN: { operatorName: 'mask', params: [1] } });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.field).toBe('operators.SSN.params');
    }
  });
});
