import { fail, ok, Result } from '../common/errors';
import { OperatorParams } from './types';

function describe(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  return Array.isArray(value) ? 'array' : typeof value;
}

export function readString(params: OperatorParams, name: string, operator: string): Result<string | undefined> {
  const value = params[name];
  if (value === undefined) {
    return ok(undefined);
  }
  if (typeof value !== 'string') {
    return fail(`Invalid parameter value for ${name} in ${operator}, expected string but got ${describe(value)}`, {
      field: name,
      expected: 'string',
      actual: describe(value),
    });
  }
  return ok(value);
}

export function requireString(params: OperatorParams, name: string, operator: string): Result<string> {
  const result = readString(params, name, operator);
  if (!result.ok) {
    return result;
  }
  if (result.value === undefined) {
    return fail(`Expected parameter ${name} for ${operator}`, { field: name, expected: 'string' });
  }
  return ok(result.value);
}

export function requireNonNegativeInteger(params: OperatorParams, name: string, operator: string): Result<number> {
  const value = params[name];
  if (value === undefined) {
    return fail(`Expected parameter ${name} for ${operator}`, { field: name, expected: 'non-negative integer' });
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    return fail(`Invalid parameter value for ${name} in ${operator}, expected a non-negative integer`, {
      field: name,
      expected: 'non-negative integer',
      actual: value,
    });
  }
  return ok(value);
}

export function readBoolean(params: OperatorParams, name: string, operator: string, fallback: boolean): Result<boolean> {
  const value = params[name];
  if (value === undefined) {
    return ok(fallback);
  }
  if (typeof value !== 'boolean') {
    return fail(`Invalid parameter value for ${name} in ${operator}, expected boolean but got ${describe(value)}`, {
      field: name,
      expected: 'boolean',
      actual: describe(value),
    });
  }
  return ok(value);
}
