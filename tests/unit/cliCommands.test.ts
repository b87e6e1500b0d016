import { describe, it, expect, beforeAll } from 'vitest';
import { mkdtemp, writeFile, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { load } from 'js-yaml';
import { buildSampleConfig, readInputText, runAnonymize, runDeanonymize, writeResult } from '../../src/cli/commands';
import { InvalidParamError } from '../../src/common/errors';
import { configureLogger } from '../../src/common/logger';
import { parseConfig } from '../../src/config';

async function withTempDir(fn: (dir: string) => Promise<void>) {
  const dir = await mkdtemp(join(tmpdir(), 'text-anonymizer-cli-'));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

const spans = [{ entityType: 'SSN', start: 7, end: 17, score: 0.8 }];

describe('CLI commands', () => {
  beforeAll(() => {
    configureLogger({ level: 'silent' });
  });

  it('anonymizes inline text with a spans file', async () => {
    await withTempDir(async (dir) => {
      const spansPath = join(dir, 'spans.json');
      await writeFile(spansPath, JSON.stringify(spans));
      const result = await runAnonymize({ text: 'please REPLACE ME.', spans: spansPath });
      expect(result.text).toBe('please <SSN>.');
    });
  });

  it('applies config profiles and operator overrides', async () => {
    await withTempDir(async (dir) => {
      const inputPath = join(dir, 'input.txt');
      const spansPath = join(dir, 'spans.json');
      const configPath = join(dir, 'config.yaml');
      const overridesPath = join(dir, 'operators.json');
      await writeFile(inputPath, 'please REPLACE ME.');
      await writeFile(spansPath, JSON.stringify(spans));
      await writeFile(configPath, 'operators:\n  DEFAULT:\n    operatorName: hash\nprofiles:\n  strict:\n    operators:\n      DEFAULT:\n        operatorName: redact\n');

      const strict = await runAnonymize({ input: inputPath, spans: spansPath, config: configPath, profile: 'strict' });
      expect(strict.text).toBe('please .');

      await writeFile(overridesPath, JSON.stringify({ SSN: { operatorName: 'replace', params: { newValue: 'thanks' } } }));
      const overridden = await runAnonymize({
        input: inputPath,
        spans: spansPath,
        config: configPath,
        operators: overridesPath,
      });
      expect(overridden.text).toBe('please thanks.');
    });
  });

  it('rejects out of range spans with a parameter error', async () => {
    await withTempDir(async (dir) => {
      const spansPath = join(dir, 'spans.json');
      await writeFile(spansPath, JSON.stringify([{ entityType: 'X', start: 12, end: 16, score: 0.5 }]));
      const attempt = runAnonymize({ text: 'hello world', spans: spansPath });
      await expect(attempt).rejects.toBeInstanceOf(InvalidParamError);
      await expect(runAnonymize({ text: 'hello world', spans: spansPath })).rejects.toThrow(
        'Invalid span, start: 12 and end: 16, while text length is only 11.',
      );
    });
  });

  it('deanonymizes using configured keys', async () => {
    await withTempDir(async (dir) => {
      const key = 'sixteen byte key';
      const spansPath = join(dir, 'spans.json');
      const overridesPath = join(dir, 'encrypt.json');
      const entitiesPath = join(dir, 'entities.json');
      const decryptPath = join(dir, 'decrypt.json');
      await writeFile(spansPath, JSON.stringify(spans));
      await writeFile(overridesPath, JSON.stringify({ DEFAULT: { operatorName: 'encrypt', params: { key } } }));
      await writeFile(decryptPath, JSON.stringify({ DEFAULT: { operatorName: 'decrypt', params: { key } } }));

      const anonymized = await runAnonymize({ text: 'please REPLACE ME.', spans: spansPath, operators: overridesPath });
      const entities = anonymized.items.map((item) => ({
        entityType: item.entityType,
        start: item.outputStart,
        end: item.outputEnd,
      }));
      await writeFile(entitiesPath, JSON.stringify(entities));
      const restored = await runDeanonymize({ text: anonymized.text, entities: entitiesPath, operators: decryptPath });
      expect(restored.text).toBe('please REPLACE ME.');
    });
  });

  it('writes results to a file', async () => {
    await withTempDir(async (dir) => {
      const output = join(dir, 'nested', 'result.json');
      await writeResult({ text: 'abc', items: [] }, output);
      expect(JSON.parse(await readFile(output, 'utf8'))).toEqual({ text: 'abc', items: [] });
    });
  });

  it('requires some input text', async () => {
    await expect(readInputText({})).rejects.toThrow('Either --text or --input is required');
    await expect(runAnonymize({ text: 'abc', profile: 'strict' })).rejects.toThrow('--profile requires --config');
  });

  it('ships a sample config that parses', () => {
    const config = parseConfig(load(buildSampleConfig()), { TEXT_ANONYMIZER_KEY: 'test-secret-0016' });
    expect(config.operators?.PHONE_NUMBER?.operatorName).toBe('mask');
    expect(config.operators?.CREDIT_CARD?.params).toEqual({ key: 'test-secret-0016' });
    expect(config.profiles?.strict?.operators?.DEFAULT?.operatorName).toBe('redact');
  });
});
