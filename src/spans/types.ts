/**
 * A detected entity over the source text. Offsets are half-open and counted in
 * UTF-16 code units, the same units `String.prototype.slice` uses.
 */
export interface Span {
  start: number;
  end: number;
  entityType: string;
  score: number;
}

export type SpanRange = Pick<Span, 'start' | 'end'>;
