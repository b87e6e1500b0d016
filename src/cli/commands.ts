import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { performance } from 'node:perf_hooks';
import { unwrap } from '../common/errors';
import { getLogger } from '../common/logger';
import { AnonymizerConfig, loadConfig, mergeOperators } from '../config';
import { AnonymizerEngine, DeanonymizerEngine, EngineResult } from '../engine';
import { OperatorConfigMap, parseOperatorConfigMap } from '../operators';
import { recordRequestMetrics, withSpan } from '../observability';
import { parseSpans } from '../spans';

export interface InputOptions {
  text?: string;
  input?: string;
  config?: string;
  profile?: string;
  operators?: string;
  output?: string;
}

export interface AnonymizeCommandOptions extends InputOptions {
  spans?: string;
}

export interface DeanonymizeCommandOptions extends InputOptions {
  entities?: string;
}

export function buildSampleConfig(): string {
  return `operators:
  DEFAULT:
    operatorName: replace
  PHONE_NUMBER:
    operatorName: mask
    params:
      maskingChar: "*"
      charsToMask: 4
      fromEnd: true
  CREDIT_CARD:
    operatorName: encrypt
    params:
      keyEnv: TEXT_ANONYMIZER_KEY
deanonymizers:
  CREDIT_CARD:
    operatorName: decrypt
    params:
      keyEnv: TEXT_ANONYMIZER_KEY
server:
  host: 127.0.0.1
  port: 5001
logging:
  level: info
  format: text
profiles:
  strict:
    operators:
      DEFAULT:
        operatorName: redact
`;
}

async function ensureDir(filePath: string) {
  await mkdir(dirname(filePath), { recursive: true });
}

async function readJsonFile(path: string): Promise<unknown> {
  const contents = await readFile(resolve(path), 'utf8');
  return JSON.parse(contents);
}

export async function readInputText(options: InputOptions): Promise<string> {
  if (options.text !== undefined) {
    return options.text;
  }
  if (options.input) {
    return readFile(resolve(options.input), 'utf8');
  }
  throw new Error('Either --text or --input is required');
}

async function loadOptionalConfig(options: InputOptions): Promise<AnonymizerConfig> {
  if (!options.config) {
    if (options.profile) {
      throw new Error('--profile requires --config');
    }
    return {};
  }
  return loadConfig(options.config, options.profile);
}

async function readOperatorsFile(path?: string): Promise<OperatorConfigMap | undefined> {
  if (!path) {
    return undefined;
  }
  return unwrap(parseOperatorConfigMap(await readJsonFile(path)));
}

export async function writeResult(result: EngineResult, output?: string): Promise<void> {
  const serialized = `${JSON.stringify(result, null, 2)}\n`;
  if (!output) {
    process.stdout.write(serialized);
    return;
  }
  const target = resolve(output);
  await ensureDir(target);
  await writeFile(target, serialized);
}

/** Throws InvalidParamError on bad spans or operators, Error on I/O problems. */
export async function runAnonymize(options: AnonymizeCommandOptions): Promise<EngineResult> {
  const log = getLogger('cli:anonymize');
  const config = await loadOptionalConfig(options);
  const text = await readInputText(options);
  const spans = options.spans ? unwrap(parseSpans(await readJsonFile(options.spans))) : [];
  const operators = mergeOperators(config.operators, await readOperatorsFile(options.operators)) ?? {};
  const engine = new AnonymizerEngine({ logger: log });

  const startTime = performance.now();
  const result = await withSpan('text-anonymizer.cli.anonymize', { 'text_anonymizer.spans': spans.length }, () =>
    engine.anonymize(text, spans, operators),
  );
  const durationMs = Math.round((performance.now() - startTime) * 100) / 100;
  recordRequestMetrics({
    operation: 'anonymize',
    outcome: result.ok ? 'success' : 'invalid',
    durationMs,
    result: result.ok ? result.value : undefined,
  });
  const value = unwrap(result);
  log.info('Anonymized input', { items: value.items.length, durationMs });
  return value;
}

export async function runDeanonymize(options: DeanonymizeCommandOptions): Promise<EngineResult> {
  const log = getLogger('cli:deanonymize');
  const config = await loadOptionalConfig(options);
  const text = await readInputText(options);
  const entities = options.entities ? unwrap(parseSpans(await readJsonFile(options.entities), 'entities', 1)) : [];
  const operators = mergeOperators(config.deanonymizers, await readOperatorsFile(options.operators)) ?? {};
  const engine = new DeanonymizerEngine({ logger: log });

  const startTime = performance.now();
  const result = await withSpan('text-anonymizer.cli.deanonymize', { 'text_anonymizer.entities': entities.length }, () =>
    engine.deanonymize(text, entities, operators),
  );
  const durationMs = Math.round((performance.now() - startTime) * 100) / 100;
  recordRequestMetrics({
    operation: 'deanonymize',
    outcome: result.ok ? 'success' : 'invalid',
    durationMs,
    result: result.ok ? result.value : undefined,
  });
  const value = unwrap(result);
  log.info('Deanonymized input', { items: value.items.length, durationMs });
  return value;
}
