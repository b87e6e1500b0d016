import { fail, ok, Result } from '../common/errors';
import { OperatorConfig, OperatorConfigMap, OperatorParams } from './types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseOperatorConfig(entityType: string, raw: unknown): Result<OperatorConfig> {
  if (!isRecord(raw) || typeof raw.operatorName !== 'string' || raw.operatorName.length === 0) {
    return fail(`Invalid operator data for '${entityType}'`, {
      field: `operators.${entityType}`,
      expected: '{ operatorName: string, params?: object }',
    });
  }
  const params = raw.params ?? {};
  if (!isRecord(params)) {
    return fail(`Invalid operator params for '${entityType}'`, {
      field: `operators.${entityType}.params`,
      expected: 'object',
    });
  }
  const copy: OperatorParams = { ...params };
  return ok({ operatorName: raw.operatorName, params: copy });
}

/** Validates an operator mapping received as untyped data (JSON body, config file). */
export function parseOperatorConfigMap(raw: unknown): Result<OperatorConfigMap> {
  if (raw === undefined || raw === null) {
    return ok({});
  }
  if (!isRecord(raw)) {
    return fail('Invalid operators, expected a mapping of entity type to operator', {
      field: 'operators',
      expected: 'object',
    });
  }
  const operators: OperatorConfigMap = Object.create(null);
  for (const [entityType, entry] of Object.entries(raw)) {
    const parsed = parseOperatorConfig(entityType, entry);
    if (!parsed.ok) {
      return parsed;
    }
    operators[entityType] = parsed.value;
  }
  return ok(operators);
}
