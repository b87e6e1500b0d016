import type { LogFormat, LogLevel } from '../common/logger';
import type { OperatorConfigMap } from '../operators';

export interface ServerConfig {
  host?: string;
  port?: number;
}

export interface LoggingConfig {
  level?: LogLevel;
  format?: LogFormat;
}

export interface AnonymizerConfig {
  /** Operators applied by `anonymize`, keyed by entity type or DEFAULT. */
  operators?: OperatorConfigMap;
  /** Operators applied by `deanonymize`. */
  deanonymizers?: OperatorConfigMap;
  server?: ServerConfig;
  logging?: LoggingConfig;
  profiles?: Record<string, AnonymizerProfile>;
}

export type AnonymizerProfile = Omit<AnonymizerConfig, 'profiles'>;
