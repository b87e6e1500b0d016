import { fail, ok, Result } from '../common/errors';
import { Span } from './types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Reads detector output. Range checks against the text happen in the engine,
 * which knows the text length.
 */
export function parseSpans(raw: unknown, field = 'spans', defaultScore?: number): Result<Span[]> {
  if (raw === undefined || raw === null) {
    return ok([]);
  }
  if (!Array.isArray(raw)) {
    return fail(`Invalid ${field}, expected an array`, { field, expected: 'array' });
  }
  const spans: Span[] = [];
  for (const [index, item] of raw.entries()) {
    const invalid = () =>
      fail<Span[]>(`Invalid ${field}[${index}], expected { start, end, entityType, score }`, {
        field: `${field}[${index}]`,
        expected: '{ start: number, end: number, entityType: string, score: number }',
      });
    if (!isRecord(item)) {
      return invalid();
    }
    const score = item.score ?? defaultScore;
    if (!isFiniteNumber(item.start) || !isFiniteNumber(item.end) || !isFiniteNumber(score)) {
      return invalid();
    }
    if (typeof item.entityType !== 'string' || item.entityType.length === 0) {
      return invalid();
    }
    spans.push({ start: item.start, end: item.end, entityType: item.entityType, score });
  }
  return ok(spans);
}
