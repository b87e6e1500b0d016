import { Span, SpanRange } from './types';
import { fail, ok, Result } from '../common/errors';

export function spanLength(span: SpanRange): number {
  return span.end - span.start;
}

/** True when `inner` lies within `outer`; equal ranges contain each other. */
export function isContainedIn(inner: SpanRange, outer: SpanRange): boolean {
  return inner.start >= outer.start && inner.end <= outer.end;
}

export function overlaps(a: SpanRange, b: SpanRange): boolean {
  return a.start < b.end && b.start < a.end;
}

/**
 * Order used for tie-breaking: ascending start, then descending score, then
 * descending length. `Array.prototype.sort` is stable, so input position
 * settles anything left.
 */
export function compareSpans(a: Span, b: Span): number {
  if (a.start !== b.start) {
    return a.start - b.start;
  }
  if (a.score !== b.score) {
    return b.score - a.score;
  }
  return spanLength(b) - spanLength(a);
}

export function checkSpanBounds(span: SpanRange, textLength: number): Result<SpanRange> {
  const valid =
    Number.isInteger(span.start) &&
    Number.isInteger(span.end) &&
    span.start >= 0 &&
    span.start < span.end &&
    span.end <= textLength;
  if (!valid) {
    return fail(
      `Invalid span, start: ${span.start} and end: ${span.end}, while text length is only ${textLength}.`,
      { field: 'spans', expected: `0 <= start < end <= ${textLength}`, actual: { start: span.start, end: span.end } },
    );
  }
  return ok(span);
}

/**
 * Drops every span that is redundant because it shares a containment relation
 * with a stronger span. Partial overlaps are left alone.
 *
 * Spans are visited strongest first (score, then position in the ordered
 * list) and kept only if no kept span contains them or is contained by them.
 * A span contained in a dropped span is therefore judged against survivors
 * only, and no survivor contains another one.
 */
export function reconcileSpans(spans: readonly Span[]): Span[] {
  const ordered = [...spans].sort(compareSpans);
  // Positions into `ordered`; the same object may be passed more than once.
  const byStrength = ordered
    .map((_, index) => index)
    .sort((a, b) => ordered[b].score - ordered[a].score || a - b);

  const kept = new Set<number>();
  for (const index of byStrength) {
    const candidate = ordered[index];
    let redundant = false;
    for (const survivor of kept) {
      if (isContainedIn(candidate, ordered[survivor]) || isContainedIn(ordered[survivor], candidate)) {
        redundant = true;
        break;
      }
    }
    if (!redundant) {
      kept.add(index);
    }
  }

  return ordered.filter((_, index) => kept.has(index));
}
