#!/usr/bin/env node
import { Command } from 'commander';
import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { createServer } from '../api/server';
import { InvalidParamError } from '../common/errors';
import { configureLogger, getLogger, parseLogFormat, parseLogLevel } from '../common/logger';
import { AnonymizerConfig, loadConfig } from '../config';
import { AnonymizerEngine, DeanonymizerEngine } from '../engine';
import { defaultCatalog } from '../operators';
import {
  AnonymizeCommandOptions,
  buildSampleConfig,
  DeanonymizeCommandOptions,
  runAnonymize,
  runDeanonymize,
  writeResult,
} from './commands';

async function loadConfigOrExit(path: string, profile?: string): Promise<AnonymizerConfig> {
  try {
    return await loadConfig(path, profile);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    getLogger('cli').error(`Failed to load config: ${message}`);
    process.exit(1);
  }
}

function failCommand(scope: string, error: unknown): never {
  const log = getLogger(scope);
  if (error instanceof InvalidParamError) {
    log.error(error.message, { field: error.field, expected: error.expected });
  } else {
    log.error(error instanceof Error ? error.message : String(error));
  }
  process.exit(1);
}

export async function runCli(argv = process.argv) {
  const program = new Command();
  program.name('text-anonymizer').description('Rewrite detected entities in text and keep an audit trail');

  program
    .option('--log-level <level>', 'Log level (silent|error|warn|info|debug)', process.env.TEXT_ANONYMIZER_LOG_LEVEL)
    .option('--log-format <format>', 'Log format (text|json)', process.env.TEXT_ANONYMIZER_LOG_FORMAT)
    .hook('preAction', (cmd) => {
      const opts = cmd.optsWithGlobals<{ logLevel?: string; logFormat?: string }>();
      try {
        const level = parseLogLevel(opts.logLevel);
        const format = parseLogFormat(opts.logFormat);
        configureLogger({ level, format, destination: process.stderr });
      } catch (error) {
        console.error(error instanceof Error ? error.message : String(error));
        process.exit(1);
      }
    });

  program
    .command('init')
    .description('Create sample configuration file')
    .option('--config <path>', 'Config path', 'text-anonymizer.yaml')
    .action(async (options: { config: string }) => {
      const log = getLogger('cli:init');
      const target = resolve(options.config);
      await writeFile(target, buildSampleConfig(), { flag: 'wx' }).catch((error: NodeJS.ErrnoException) => {
        if (error.code === 'EEXIST') {
          log.error(`Config file already exists at ${target}`);
          process.exit(1);
        }
        throw error;
      });
      log.info(`Created config at ${target}`);
    });

  program
    .command('anonymize')
    .description('Anonymize detected spans of a text and print the result as JSON')
    .option('--text <text>', 'Text to anonymize')
    .option('--input <path>', 'File holding the text to anonymize')
    .option('--spans <path>', 'JSON file with detected spans')
    .option('--config <path>', 'Config file path')
    .option('--profile <name>', 'Config profile')
    .option('--operators <path>', 'JSON file with operator overrides')
    .option('--output <path>', 'Write the result to a file instead of stdout')
    .action(async (options: AnonymizeCommandOptions) => {
      try {
        await writeResult(await runAnonymize(options), options.output);
      } catch (error) {
        failCommand('cli:anonymize', error);
      }
    });

  program
    .command('deanonymize')
    .description('Restore encrypted entities of an anonymized text')
    .option('--text <text>', 'Anonymized text')
    .option('--input <path>', 'File holding the anonymized text')
    .option('--entities <path>', 'JSON file with entity ranges in the anonymized text')
    .option('--config <path>', 'Config file path')
    .option('--profile <name>', 'Config profile')
    .option('--operators <path>', 'JSON file with operator overrides')
    .option('--output <path>', 'Write the result to a file instead of stdout')
    .action(async (options: DeanonymizeCommandOptions) => {
      try {
        await writeResult(await runDeanonymize(options), options.output);
      } catch (error) {
        failCommand('cli:deanonymize', error);
      }
    });

  program
    .command('operators')
    .description('List available operators')
    .action(() => {
      const listing = {
        anonymizers: defaultCatalog.list('anonymize'),
        deanonymizers: defaultCatalog.list('deanonymize'),
      };
      process.stdout.write(`${JSON.stringify(listing, null, 2)}\n`);
    });

  program
    .command('serve')
    .description('Start HTTP server')
    .option('--config <path>', 'Config file path')
    .option('--profile <name>', 'Config profile')
    .option('--port <number>', 'Port override')
    .option('--host <host>', 'Host override')
    .action(async (options: { config?: string; profile?: string; port?: string; host?: string }) => {
      const config: AnonymizerConfig = options.config ? await loadConfigOrExit(options.config, options.profile) : {};
      const flags = program.opts<{ logLevel?: string; logFormat?: string }>();
      configureLogger({
        level: flags.logLevel ? undefined : config.logging?.level,
        format: flags.logFormat ? undefined : config.logging?.format,
      });
      const log = getLogger('cli:serve');
      const port = options.port ? Number(options.port) : config.server?.port ?? 5001;
      const host = options.host ?? config.server?.host ?? '127.0.0.1';
      const server = createServer({
        anonymizer: new AnonymizerEngine({ logger: log.child('anonymizer') }),
        deanonymizer: new DeanonymizerEngine({ logger: log.child('deanonymizer') }),
        operators: config.operators,
        deanonymizers: config.deanonymizers,
      });
      await server.listen({ port, host });
      log.info(`Server listening on http://${host}:${port}`);
    });

  await program.parseAsync(argv);
}

if (require.main === module) {
  runCli().catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
}
