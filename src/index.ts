#!/usr/bin/env node

import * as dotenv from 'dotenv';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { createApp, prepareDevice } from './app';
import { ConfigLoader } from './config/config-loader';
import { AppConfig, LogLevelSchema } from './config/types';
import { createDefaultRegistry } from './drivers/driver-registry';
import { EXIT_CODES, ExitCode, FieldLoggerError, toError } from './errors';
import { LogSink } from './logging/log-sink';

function exitCodeFor(error: unknown): ExitCode {
  return error instanceof FieldLoggerError ? error.exitCode : EXIT_CODES.CONFIG_ERROR;
}

/**
 * CLI interface for the field logger
 */
async function main(): Promise<ExitCode> {
  dotenv.config();

  const argv = await yargs(hideBin(process.argv))
    .scriptName('modbus-field-logger')
    .option('config', {
      alias: 'c',
      description: 'Path to configuration file (falls back to MODBUS_LOGGER_CONFIG)',
      type: 'string',
    })
    .option('example-config', {
      description: 'Write an example configuration file and exit',
      type: 'string',
    })
    .option('validate-config', {
      description: 'Validate a configuration file and exit',
      type: 'string',
    })
    .option('log-level', {
      alias: 'l',
      description: 'Log level (debug, info, warn, error)',
      type: 'string',
    })
    .option('cycles', {
      description: 'Stop after this many poll cycles',
      type: 'number',
    })
    .help()
    .alias('help', 'h')
    .version()
    .alias('version', 'v')
    .strict()
    .parseAsync();

  if (argv.exampleConfig) {
    ConfigLoader.saveToFile(ConfigLoader.createExampleConfig(), argv.exampleConfig);
    console.log(`Example configuration saved to: ${argv.exampleConfig}`);
    return EXIT_CODES.OK;
  }

  if (argv.validateConfig) {
    const config = ConfigLoader.loadFromFile(argv.validateConfig);
    const { driver, header, descriptor } = prepareDevice(config, createDefaultRegistry());
    console.log(`Configuration '${argv.validateConfig}' is valid`);
    console.log(`Device type: ${driver.typeName} (${descriptor.unitIds.length} unit(s))`);
    console.log(`Header: ${header.join(',')}`);
    return EXIT_CODES.OK;
  }

  const config: AppConfig = argv.config ? ConfigLoader.loadFromFile(argv.config) : ConfigLoader.loadFromEnv();
  const level = LogLevelSchema.parse(argv.logLevel ?? process.env.LOG_LEVEL ?? config.logging.level);

  const logSink = new LogSink({
    baseFolder: config.logging.baseFolder,
    retentionDays: config.logging.retentionDays,
    level,
    console: config.logging.console,
  });
  logSink.rotateIfNeeded();
  const logger = logSink.forComponent('Main');

  try {
    const app = await createApp(config, logSink, { maxCycles: argv.cycles });

    const shutdown = (signal: NodeJS.Signals) => {
      logger.info(`Received ${signal}, stopping after the current read`);
      app.scheduler.stop();
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    logger.info('Starting continuous logging (Ctrl+C to stop)');
    return await app.scheduler.runForever();

  } catch (error) {
    const err = toError(error);
    logger.error(`${err.name}: ${err.message}`);
    return exitCodeFor(err);

  } finally {
    await logSink.close();
  }
}

if (require.main === module) {
  main()
    .then((code) => process.exit(code))
    .catch((error) => {
      console.error('Error:', toError(error).message);
      process.exit(exitCodeFor(error));
    });
}

export { main, createApp, ConfigLoader, LogSink };
