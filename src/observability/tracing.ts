import { Attributes, SpanStatusCode, trace } from '@opentelemetry/api';

type SpanAttributes = Record<string, string | number | boolean | undefined>;

const TRACER_NAME = 'text-anonymizer';

function toAttributes(attributes?: SpanAttributes): Attributes | undefined {
  if (!attributes) {
    return undefined;
  }
  return Object.fromEntries(
    Object.entries(attributes).filter((entry): entry is [string, string | number | boolean] => entry[1] !== undefined),
  );
}

/**
 * Runs `fn` inside an active span. The span ends when the returned promise
 * settles; a rejection is recorded on the span and rethrown.
 */
export function withSpan<T>(name: string, attributes: SpanAttributes | undefined, fn: () => T | Promise<T>): Promise<T> {
  const tracer = trace.getTracer(TRACER_NAME);

  return new Promise<T>((resolve, reject) => {
    tracer.startActiveSpan(name, { attributes: toAttributes(attributes) }, (span) => {
      Promise.resolve()
        .then(fn)
        .then((result) => {
          span.setStatus({ code: SpanStatusCode.OK });
          resolve(result);
        })
        .catch((error: unknown) => {
          const failure = error instanceof Error ? error : new Error(String(error));
          span.recordException(failure);
          span.setStatus({ code: SpanStatusCode.ERROR, message: failure.message });
          reject(error);
        })
        .finally(() => {
          span.end();
        });
    });
  });
}
