import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';
import type { EngineResult } from '../engine';

export type AnonymizerOperation = 'anonymize' | 'deanonymize';
export type RequestOutcome = 'success' | 'invalid';

export interface RequestMetrics {
  operation: AnonymizerOperation;
  outcome: RequestOutcome;
  durationMs: number;
  result?: EngineResult;
}

const registry = new Registry();
collectDefaultMetrics({ register: registry });

const requestCounter = new Counter({
  name: 'text_anonymizer_requests_total',
  help: 'Number of anonymize and deanonymize calls by outcome',
  labelNames: ['operation', 'outcome'],
  registers: [registry],
});

const requestDuration = new Histogram({
  name: 'text_anonymizer_request_duration_seconds',
  help: 'Duration of anonymize and deanonymize calls in seconds',
  labelNames: ['operation'],
  buckets: [0.0005, 0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 5],
  registers: [registry],
});

const operatorCounter = new Counter({
  name: 'text_anonymizer_operator_applications_total',
  help: 'Number of spans rewritten, by operator',
  labelNames: ['operator'],
  registers: [registry],
});

export function recordRequestMetrics(metrics: RequestMetrics): void {
  requestCounter.inc({ operation: metrics.operation, outcome: metrics.outcome });
  requestDuration.observe({ operation: metrics.operation }, metrics.durationMs / 1000);
  for (const item of metrics.result?.items ?? []) {
    operatorCounter.inc({ operator: item.operatorName });
  }
}

export function metricsContentType(): string {
  return registry.contentType;
}

export async function getMetricsSnapshot(): Promise<string> {
  return registry.metrics();
}
