import { ok, Result } from '../common/errors';
import { Operator } from './types';

export class RedactOperator implements Operator {
  readonly name = 'redact';
  readonly kind = 'irreversible';
  readonly direction = 'anonymize';

  validate(): Result<void> {
    return ok(undefined);
  }

  operate(): Result<string> {
    return ok('');
  }
}
