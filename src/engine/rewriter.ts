import { fail, ok, Result } from '../common/errors';
import { AppliedChange, EngineResult, ResolvedOperation } from './types';

interface Splice {
  operation: ResolvedOperation;
  clippedEnd: number;
  replacement: string;
}

/**
 * Applies operations right to left so that offsets of operations still to be
 * processed keep pointing at untouched text.
 *
 * When two operations overlap, the left one is clipped at the start of the
 * right one: its operator sees only `text[start, nextStart)` and text already
 * rewritten is never consumed again. Audit records keep the operation's own
 * offsets.
 */
export function rewriteText(text: string, operations: readonly ResolvedOperation[]): Result<EngineResult> {
  const descending = [...operations].sort((a, b) => b.start - a.start || b.end - a.end);
  const splices: Splice[] = [];
  let working = text;
  let boundary = text.length;

  for (const operation of descending) {
    const clippedEnd = Math.max(operation.start, Math.min(operation.end, boundary));
    const slice = working.slice(operation.start, clippedEnd);
    const result = operation.operator.operate(slice, operation.params, { entityType: operation.entityType });
    if (!result.ok) {
      return fail(
        `Operator '${operation.operator.name}' failed on entity '${operation.entityType}': ${result.error.message}`,
        { field: result.error.field, expected: result.error.expected, actual: result.error.actual },
      );
    }
    working = working.slice(0, operation.start) + result.value + working.slice(clippedEnd);
    boundary = operation.start;
    splices.push({ operation, clippedEnd, replacement: result.value });
  }

  const items: AppliedChange[] = [];
  let shift = 0;
  for (const splice of splices.reverse()) {
    const { operation, clippedEnd, replacement } = splice;
    const outputStart = operation.start + shift;
    items.push({
      operatorName: operation.operator.name,
      entityType: operation.entityType,
      start: operation.start,
      end: operation.end,
      anonymizedText: replacement,
      outputStart,
      outputEnd: outputStart + replacement.length,
    });
    shift += replacement.length - (clippedEnd - operation.start);
  }

  return ok({ text: working, items });
}
