import { readFile } from 'node:fs/promises';
import { extname, resolve } from 'node:path';
import { load as loadYaml } from 'js-yaml';
import { parseLogFormat, parseLogLevel } from '../common/logger';
import { OperatorConfigMap, parseOperatorConfigMap } from '../operators';
import { AnonymizerConfig, AnonymizerProfile, LoggingConfig, ServerConfig } from './types';

type Env = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export async function loadConfig(path: string, profile?: string, env: Env = process.env): Promise<AnonymizerConfig> {
  const absolute = resolve(path);
  const contents = await readFile(absolute, 'utf8');
  const ext = extname(absolute).toLowerCase();
  let raw: unknown;

  switch (ext) {
    case '.yaml':
    case '.yml':
      raw = loadYaml(contents);
      break;
    case '.json':
      raw = JSON.parse(contents);
      break;
    default:
      throw new Error(`Unsupported config format for ${absolute}`);
  }

  const parsed = parseConfig(raw ?? {}, env);
  if (!profile) {
    return parsed;
  }
  const profileConfig = parsed.profiles?.[profile];
  if (!profileConfig) {
    throw new Error(`Profile ${profile} not found in config`);
  }
  return mergeConfigs(parsed, profileConfig);
}

export function parseConfig(raw: unknown, env: Env = process.env): AnonymizerConfig {
  if (!isRecord(raw)) {
    throw new Error('Config must be a mapping');
  }
  const config: AnonymizerConfig = parseProfile(raw, env, 'config');
  if (raw.profiles !== undefined) {
    if (!isRecord(raw.profiles)) {
      throw new Error('Config "profiles" must be a mapping');
    }
    config.profiles = {};
    for (const [name, value] of Object.entries(raw.profiles)) {
      if (!isRecord(value)) {
        throw new Error(`Profile ${name} must be a mapping`);
      }
      config.profiles[name] = parseProfile(value, env, `profiles.${name}`);
    }
  }
  return config;
}

function parseProfile(raw: Record<string, unknown>, env: Env, section: string): AnonymizerProfile {
  const profile: AnonymizerProfile = {};
  if (raw.operators !== undefined) {
    profile.operators = parseOperators(raw.operators, env, `${section}.operators`);
  }
  if (raw.deanonymizers !== undefined) {
    profile.deanonymizers = parseOperators(raw.deanonymizers, env, `${section}.deanonymizers`);
  }
  if (raw.server !== undefined) {
    profile.server = parseServer(raw.server, section);
  }
  if (raw.logging !== undefined) {
    profile.logging = parseLogging(raw.logging, section);
  }
  return profile;
}

function parseOperators(raw: unknown, env: Env, section: string): OperatorConfigMap {
  const parsed = parseOperatorConfigMap(raw);
  if (!parsed.ok) {
    throw new Error(`${section}: ${parsed.error.message}`);
  }
  const operators: OperatorConfigMap = {};
  for (const [entityType, config] of Object.entries(parsed.value)) {
    const { keyEnv, ...params } = config.params ?? {};
    if (keyEnv === undefined) {
      operators[entityType] = config;
      continue;
    }
    if (typeof keyEnv !== 'string') {
      throw new Error(`${section}.${entityType}: keyEnv must name an environment variable`);
    }
    const key = env[keyEnv];
    if (!key) {
      throw new Error(`${section}.${entityType}: environment variable ${keyEnv} is not set`);
    }
    operators[entityType] = { operatorName: config.operatorName, params: { ...params, key } };
  }
  return operators;
}

function parseServer(raw: unknown, section: string): ServerConfig {
  if (!isRecord(raw)) {
    throw new Error(`${section}.server must be a mapping`);
  }
  const server: ServerConfig = {};
  if (raw.host !== undefined) {
    if (typeof raw.host !== 'string') {
      throw new Error(`${section}.server.host must be a string`);
    }
    server.host = raw.host;
  }
  if (raw.port !== undefined) {
    if (typeof raw.port !== 'number' || !Number.isInteger(raw.port) || raw.port < 0 || raw.port > 65535) {
      throw new Error(`${section}.server.port must be a port number`);
    }
    server.port = raw.port;
  }
  return server;
}

function parseLogging(raw: unknown, section: string): LoggingConfig {
  if (!isRecord(raw)) {
    throw new Error(`${section}.logging must be a mapping`);
  }
  const { level, format } = raw;
  if (level !== undefined && typeof level !== 'string') {
    throw new Error(`${section}.logging.level must be a string`);
  }
  if (format !== undefined && typeof format !== 'string') {
    throw new Error(`${section}.logging.format must be a string`);
  }
  return {
    level: parseLogLevel(level),
    format: parseLogFormat(format),
  };
}

export function mergeConfigs(base: AnonymizerConfig, overlay: AnonymizerProfile): AnonymizerConfig {
  return {
    ...base,
    operators: mergeOperators(base.operators, overlay.operators),
    deanonymizers: mergeOperators(base.deanonymizers, overlay.deanonymizers),
    server: {
      ...base.server,
      ...overlay.server,
    },
    logging: {
      ...base.logging,
      ...overlay.logging,
    },
  };
}

export function mergeOperators(base?: OperatorConfigMap, overlay?: OperatorConfigMap): OperatorConfigMap | undefined {
  if (!base && !overlay) {
    return undefined;
  }
  return { ...base, ...overlay };
}
