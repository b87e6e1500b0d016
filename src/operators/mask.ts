import { fail, ok, Result } from '../common/errors';
import { readBoolean, requireNonNegativeInteger, requireString } from './params';
import { Operator, OperatorParams } from './types';

interface MaskSettings {
  maskingChar: string;
  charsToMask: number;
  fromEnd: boolean;
}

function readSettings(params: OperatorParams): Result<MaskSettings> {
  const maskingChar = requireString(params, 'maskingChar', 'mask');
  if (!maskingChar.ok) {
    return maskingChar;
  }
  const codePoints = [...maskingChar.value].length;
  if (codePoints !== 1) {
    return fail('Invalid input, maskingChar must be a single character', {
      field: 'maskingChar',
      expected: 'single character',
      actual: codePoints,
    });
  }
  const charsToMask = requireNonNegativeInteger(params, 'charsToMask', 'mask');
  if (!charsToMask.ok) {
    return charsToMask;
  }
  const fromEnd = readBoolean(params, 'fromEnd', 'mask', false);
  if (!fromEnd.ok) {
    return fromEnd;
  }
  return ok({ maskingChar: maskingChar.value, charsToMask: charsToMask.value, fromEnd: fromEnd.value });
}

export class MaskOperator implements Operator {
  readonly name = 'mask';
  readonly kind = 'irreversible';
  readonly direction = 'anonymize';

  validate(params: OperatorParams): Result<void> {
    const settings = readSettings(params);
    return settings.ok ? ok(undefined) : settings;
  }

  operate(text: string, params: OperatorParams): Result<string> {
    const settings = readSettings(params);
    if (!settings.ok) {
      return settings;
    }
    const { maskingChar, charsToMask, fromEnd } = settings.value;
    if (charsToMask > text.length) {
      return fail(`Invalid input, charsToMask ${charsToMask} exceeds the masked text length ${text.length}`, {
        field: 'charsToMask',
        expected: `<= ${text.length}`,
        actual: charsToMask,
      });
    }
    const mask = maskingChar.repeat(charsToMask);
    if (fromEnd) {
      return ok(text.slice(0, text.length - charsToMask) + mask);
    }
    return ok(mask + text.slice(charsToMask));
  }
}
