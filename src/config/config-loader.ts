import * as fs from 'fs';
import * as path from 'path';
import { ZodError } from 'zod';
import { ConfigError } from '../errors';
import { AppConfig, AppConfigInput, AppConfigSchema } from './types';

export const CONFIG_ENV_VAR = 'MODBUS_LOGGER_CONFIG';

function describeZodError(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Configuration loader for the field logger
 */
export class ConfigLoader {

  /**
   * Load and validate configuration from a JSON file
   */
  static loadFromFile(configPath: string): AppConfig {
    if (!fs.existsSync(configPath)) {
      throw new ConfigError(`Configuration file not found: ${configPath}`);
    }

    let configData: string;
    try {
      configData = fs.readFileSync(configPath, 'utf8');
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Cannot read configuration file ${configPath}: ${errorMessage}`, { cause: error });
    }

    return ConfigLoader.parse(configData, configPath);
  }

  /**
   * Load configuration from the MODBUS_LOGGER_CONFIG environment variable
   */
  static loadFromEnv(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const configJson = env[CONFIG_ENV_VAR];
    if (!configJson) {
      throw new ConfigError(`${CONFIG_ENV_VAR} environment variable not set`);
    }
    return ConfigLoader.parse(configJson, CONFIG_ENV_VAR);
  }

  /**
   * Validate an already parsed configuration object
   */
  static validate(rawConfig: unknown, source = 'configuration'): AppConfig {
    const result = AppConfigSchema.safeParse(rawConfig);
    if (!result.success) {
      throw new ConfigError(`Invalid ${source}: ${describeZodError(result.error)}`, { cause: result.error });
    }
    return result.data;
  }

  /**
   * Example configuration for a chain of DC energy meters on a serial bus
   */
  static createExampleConfig(): AppConfigInput {
    return {
      transport: {
        type: 'serial',
        serialPort: '/dev/ttyS0',
        baudRate: 19200,
        dataBits: 8,
        stopBits: 1,
        parity: 'none',
        timeout: 200,
        retryAttempts: 3,
        retryDelay: 1000,
      },
      device: {
        typeName: 'energy-meter',
        startAddress: 0,
        registerCount: 40,
        unitIdRange: { from: 1, to: 8 },
      },
      logging: {
        baseFolder: '/mnt/data_storage/modbus_loggers/dc_meter',
        retentionDays: 30,
        fileSuffix: 'dc_meter_log',
        cycleIntervalSeconds: 2,
        level: 'info',
        diskUsagePaths: ['/'],
      },
    };
  }

  /**
   * Validate and save configuration to file
   */
  static saveToFile(config: AppConfigInput, configPath: string): void {
    ConfigLoader.validate(config);

    const configDir = path.dirname(configPath);
    if (!fs.existsSync(configDir)) {
      fs.mkdirSync(configDir, { recursive: true });
    }
    fs.writeFileSync(configPath, JSON.stringify(config, null, 2), 'utf8');
  }

  private static parse(configJson: string, source: string): AppConfig {
    let rawConfig: unknown;
    try {
      rawConfig = JSON.parse(configJson);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`JSON syntax error in ${source}: ${errorMessage}`, { cause: error });
    }
    return ConfigLoader.validate(rawConfig, source);
  }
}
