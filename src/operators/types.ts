import { Result } from '../common/errors';

export type OperatorKind = 'reversible' | 'irreversible';

/** Which engine may run the operator: forward anonymization or its reversal. */
export type OperatorDirection = 'anonymize' | 'deanonymize';

export type OperatorParams = Record<string, unknown>;

export interface OperatorContext {
  entityType: string;
}

export interface Operator {
  readonly name: string;
  readonly kind: OperatorKind;
  readonly direction: OperatorDirection;
  validate(params: OperatorParams): Result<void>;
  operate(text: string, params: OperatorParams, context: OperatorContext): Result<string>;
}

export interface OperatorConfig {
  operatorName: string;
  params?: OperatorParams;
}

export type OperatorConfigMap = Record<string, OperatorConfig>;

export const DEFAULT_OPERATOR_KEY = 'DEFAULT';
