import Fastify, { FastifyInstance, FastifyReply } from 'fastify';
import { performance } from 'node:perf_hooks';
import { InvalidParamError, Result } from '../common/errors';
import { getLogger } from '../common/logger';
import { AnonymizerEngine, DeanonymizerEngine, EngineResult } from '../engine';
import { mergeOperators } from '../config';
import { OperatorConfigMap, parseOperatorConfigMap } from '../operators';
import { parseSpans } from '../spans';
import {
  AnonymizerOperation,
  getMetricsSnapshot,
  metricsContentType,
  recordRequestMetrics,
  withSpan,
} from '../observability';

export interface ServerOptions {
  anonymizer?: AnonymizerEngine;
  deanonymizer?: DeanonymizerEngine;
  /** Configured operators; entries sent with a request take precedence. */
  operators?: OperatorConfigMap;
  deanonymizers?: OperatorConfigMap;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function createServer(options: ServerOptions = {}): FastifyInstance {
  const log = getLogger('server');
  const app = Fastify({ logger: false });
  const anonymizer = options.anonymizer ?? new AnonymizerEngine({ logger: log.child('anonymizer') });
  const deanonymizer = options.deanonymizer ?? new DeanonymizerEngine({ logger: log.child('deanonymizer') });

  const respond = (
    reply: FastifyReply,
    operation: AnonymizerOperation,
    startTime: number,
    result: Result<EngineResult>,
  ) => {
    const durationMs = Math.round((performance.now() - startTime) * 100) / 100;
    if (!result.ok) {
      recordRequestMetrics({ operation, outcome: 'invalid', durationMs });
      log.warn(`Rejected ${operation} request`, { reason: result.error.message, field: result.error.field });
      reply.status(422);
      return result.error.toJSON();
    }
    recordRequestMetrics({ operation, outcome: 'success', durationMs, result: result.value });
    log.debug(`Completed ${operation} request`, { items: result.value.items.length, durationMs });
    return result.value;
  };

  const rejectBody = (reply: FastifyReply) => {
    reply.status(400);
    return { error: 'Request body must be a JSON object with a "text" string' };
  };

  const rejectShape = (
    reply: FastifyReply,
    operation: AnonymizerOperation,
    startTime: number,
    error: InvalidParamError,
  ) => {
    const durationMs = Math.round((performance.now() - startTime) * 100) / 100;
    recordRequestMetrics({ operation, outcome: 'invalid', durationMs });
    log.warn(`Rejected malformed ${operation} request`, { reason: error.message, field: error.field });
    reply.status(400);
    return error.toJSON();
  };

  app.get('/health', async () => ({ status: 'ok' }));

  app.get('/anonymizers', async () => anonymizer.listOperators());

  app.get('/deanonymizers', async () => deanonymizer.listOperators());

  app.post('/anonymize', async (request, reply) => {
    const startTime = performance.now();
    const body = request.body;
    if (!isRecord(body) || typeof body.text !== 'string') {
      return rejectBody(reply);
    }
    const { text } = body;
    const spans = parseSpans(body.spans);
    if (!spans.ok) {
      return rejectShape(reply, 'anonymize', startTime, spans.error);
    }
    const operators = parseOperatorConfigMap(body.operators);
    if (!operators.ok) {
      return rejectShape(reply, 'anonymize', startTime, operators.error);
    }
    const merged = mergeOperators(options.operators, operators.value) ?? {};
    const result = await withSpan(
      'text-anonymizer.anonymize',
      { 'text_anonymizer.spans': spans.value.length, 'text_anonymizer.text_length': text.length },
      () => anonymizer.anonymize(text, spans.value, merged),
    );
    return respond(reply, 'anonymize', startTime, result);
  });

  app.post('/deanonymize', async (request, reply) => {
    const startTime = performance.now();
    const body = request.body;
    if (!isRecord(body) || typeof body.text !== 'string') {
      return rejectBody(reply);
    }
    const { text } = body;
    const entities = parseSpans(body.entities, 'entities', 1);
    if (!entities.ok) {
      return rejectShape(reply, 'deanonymize', startTime, entities.error);
    }
    const operators = parseOperatorConfigMap(body.operators);
    if (!operators.ok) {
      return rejectShape(reply, 'deanonymize', startTime, operators.error);
    }
    const merged = mergeOperators(options.deanonymizers, operators.value) ?? {};
    const result = await withSpan(
      'text-anonymizer.deanonymize',
      { 'text_anonymizer.entities': entities.value.length, 'text_anonymizer.text_length': text.length },
      () => deanonymizer.deanonymize(text, entities.value, merged),
    );
    return respond(reply, 'deanonymize', startTime, result);
  });

  app.get('/metrics', async (request, reply) => {
    const metrics = await getMetricsSnapshot();
    reply.header('Content-Type', metricsContentType());
    reply.send(metrics);
  });

  return app;
}
