import { fail, ok, Result } from '../common/errors';
import {
  DEFAULT_OPERATOR_KEY,
  OperatorCatalog,
  OperatorConfig,
  OperatorConfigMap,
  OperatorDirection,
  parseOperatorConfig,
} from '../operators';
import { EntityRange, ResolvedOperation } from './types';

export interface DispatchOptions {
  catalog: OperatorCatalog;
  /** Restricts resolution to operators of one direction. */
  direction?: OperatorDirection;
  /** Used when neither the entity type nor DEFAULT has an entry. */
  fallback?: (entityType: string) => OperatorConfig;
}

export const replaceFallback = (): OperatorConfig => ({ operatorName: 'replace', params: {} });

export function resolveOperatorConfig(
  entityType: string,
  operators: OperatorConfigMap,
  fallback?: DispatchOptions['fallback'],
): Result<OperatorConfig> {
  const key = [entityType, DEFAULT_OPERATOR_KEY].find((candidate) => Object.hasOwn(operators, candidate));
  if (key === undefined) {
    const fallbackConfig = fallback?.(entityType);
    if (!fallbackConfig) {
      return fail(`No operator configured for entity '${entityType}' and no ${DEFAULT_OPERATOR_KEY} entry`, {
        field: `operators.${entityType}`,
        expected: 'operator configuration',
      });
    }
    return ok(fallbackConfig);
  }
  // Entries handed in by library callers are unchecked.
  const entry: unknown = operators[key];
  return parseOperatorConfig(key, entry);
}

export function resolveOperation(
  range: EntityRange,
  operators: OperatorConfigMap,
  options: DispatchOptions,
): Result<ResolvedOperation> {
  const config = resolveOperatorConfig(range.entityType, operators, options.fallback);
  if (!config.ok) {
    return config;
  }

  const { operatorName } = config.value;
  const operator = options.catalog.get(operatorName);
  if (!operator) {
    return fail(`Invalid operator class '${operatorName}'.`, {
      field: `operators.${range.entityType}.operatorName`,
      expected: options.catalog.list(options.direction).join(' | '),
      actual: operatorName,
    });
  }
  if (options.direction && operator.direction !== options.direction) {
    return fail(`Operator '${operatorName}' cannot be used to ${options.direction}`, {
      field: `operators.${range.entityType}.operatorName`,
      expected: options.catalog.list(options.direction).join(' | '),
      actual: operatorName,
    });
  }

  const params = config.value.params ?? {};
  const validation = operator.validate(params);
  if (!validation.ok) {
    return fail(`Invalid parameters for operator '${operatorName}' on entity '${range.entityType}': ${validation.error.message}`, {
      field: validation.error.field,
      expected: validation.error.expected,
      actual: validation.error.actual,
    });
  }

  return ok({ start: range.start, end: range.end, entityType: range.entityType, operator, params });
}
