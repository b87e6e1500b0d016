import type { Operator, OperatorParams } from '../operators';

export interface EntityRange {
  start: number;
  end: number;
  entityType: string;
}

/** A surviving span bound to a validated operator invocation. */
export interface ResolvedOperation extends EntityRange {
  operator: Operator;
  params: OperatorParams;
}

/**
 * Audit record of one operator invocation. `start`/`end` are the span's
 * offsets in the input text; `outputStart`/`outputEnd` locate the
 * replacement in the returned text.
 */
export interface AppliedChange {
  operatorName: string;
  entityType: string;
  start: number;
  end: number;
  anonymizedText: string;
  outputStart: number;
  outputEnd: number;
}

export interface EngineResult {
  text: string;
  items: AppliedChange[];
}

export type AnonymizationResult = EngineResult;
export type DeanonymizationResult = EngineResult;
