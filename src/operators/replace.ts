import { ok, Result } from '../common/errors';
import { readString } from './params';
import { Operator, OperatorContext, OperatorParams } from './types';

export function placeholderFor(entityType: string): string {
  return `<${entityType.toUpperCase()}>`;
}

export class ReplaceOperator implements Operator {
  readonly name = 'replace';
  readonly kind = 'irreversible';
  readonly direction = 'anonymize';

  validate(params: OperatorParams): Result<void> {
    const newValue = readString(params, 'newValue', this.name);
    return newValue.ok ? ok(undefined) : newValue;
  }

  operate(_text: string, params: OperatorParams, context: OperatorContext): Result<string> {
    const newValue = readString(params, 'newValue', this.name);
    if (!newValue.ok) {
      return newValue;
    }
    return ok(newValue.value ?? placeholderFor(context.entityType));
  }
}
