/**
 * Composition root: turns a validated configuration into a ready
 * PollScheduler. Every configuration check runs before the link is
 * opened, so a bad configuration never reaches the transport.
 */

import type { AppConfig, DeviceConfig, TransportConfig } from './config/types';
import { createDefaultRegistry, DriverRegistry } from './drivers/driver-registry';
import { headerFor } from './drivers/record';
import type { DeviceDescriptor, DeviceDriver } from './drivers/types';
import { ConfigError } from './errors';
import { reportDiskUsage } from './logging/disk-usage';
import type { LogSink } from './logging/log-sink';
import type { Logger } from './logging/types';
import { CsvFileSink, OutputSink } from './output/csv-sink';
import { PollScheduler } from './polling/poll-scheduler';
import { RetryPolicy } from './polling/retry-policy';
import { ModbusClient } from './transport/modbus-client';
import { MAX_REGISTERS_PER_READ, ModbusConnection } from './transport/types';
import type { Sleep } from './utils/sleep';

export interface PreparedDevice {
  descriptor: DeviceDescriptor;
  driver: DeviceDriver;
  header: string[];
}

export interface AppOptions {
  registry?: DriverRegistry;
  connect?: (config: TransportConfig, logger: Logger) => Promise<ModbusConnection>;
  sink?: OutputSink;
  maxCycles?: number;
  sleep?: Sleep;
  now?: () => Date;
}

export interface App extends PreparedDevice {
  scheduler: PollScheduler;
}

export function toDeviceDescriptor(device: DeviceConfig): DeviceDescriptor {
  return Object.freeze({
    typeName: device.typeName,
    startAddress: device.startAddress,
    registerCount: device.registerCount,
    unitIds: Object.freeze([...device.unitIdRange]),
    registerType: device.registerType,
    gatewayUnitId: device.gatewayUnitId,
    stride: device.stride,
    interReadDelayMs: device.interReadDelayMs,
    escalation: device.escalation,
  });
}

/**
 * Resolve the driver and check the descriptor and header against it.
 * @throws ConfigError
 */
export function prepareDevice(config: AppConfig, registry: DriverRegistry): PreparedDevice {
  const descriptor = toDeviceDescriptor(config.device);
  const driver = registry.resolve(descriptor.typeName);

  const needed = driver.minRegisters(descriptor);
  if (descriptor.registerCount < needed) {
    throw new ConfigError(
      `${driver.typeName} needs registerCount >= ${needed}, configured ${descriptor.registerCount}`
    );
  }

  driver.validate?.(descriptor);

  for (const unitId of descriptor.unitIds) {
    const request = driver.planRead(descriptor, unitId);
    if (request.count > MAX_REGISTERS_PER_READ || request.address + request.count > 0x10000) {
      throw new ConfigError(
        `Read for unit ${unitId} (address ${request.address}, ${request.count} registers) is out of range`
      );
    }
  }

  const header = headerFor(driver, descriptor);
  const configured = config.logging.header;
  if (configured && configured.length > 0) {
    const matches =
      configured.length === header.length && configured.every((column, index) => column === header[index]);
    if (!matches) {
      throw new ConfigError(
        `Configured header does not match ${driver.typeName}: expected [${header.join(', ')}]`
      );
    }
  }

  return { descriptor, driver, header };
}

async function connectModbus(config: TransportConfig, logger: Logger): Promise<ModbusConnection> {
  const client = new ModbusClient(config, logger);
  await client.connect();
  return client;
}

export async function createApp(config: AppConfig, logSink: LogSink, options: AppOptions = {}): Promise<App> {
  const registry = options.registry ?? createDefaultRegistry();
  const prepared = prepareDevice(config, registry);
  const logger = logSink.forComponent('App');

  logger.info(
    `Device ${prepared.driver.typeName}: ${prepared.descriptor.unitIds.length} unit(s), ` +
      `${prepared.descriptor.registerCount} registers from ${prepared.descriptor.startAddress}`
  );

  const connect = options.connect ?? connectModbus;
  const connection = await connect(config.transport, logSink.forComponent('ModbusClient'));

  const retryPolicy = new RetryPolicy({
    maxAttempts: config.transport.retryAttempts,
    backoffMs: config.transport.retryDelay,
    logger: logSink.forComponent('RetryPolicy'),
    sleep: options.sleep,
  });

  const sink =
    options.sink ??
    new CsvFileSink(
      { baseFolder: config.logging.baseFolder, fileSuffix: config.logging.fileSuffix },
      logSink.forComponent('CsvSink')
    );

  const diskLogger = logSink.forComponent('DiskUsage');
  const scheduler = new PollScheduler({
    descriptor: prepared.descriptor,
    header: prepared.header,
    connection,
    registry,
    retryPolicy,
    sink,
    logger: logSink.forComponent('PollScheduler'),
    cycleIntervalMs: config.logging.cycleIntervalSeconds * 1000,
    maxCycles: options.maxCycles,
    sleep: options.sleep,
    now: options.now,
    onCycleStart: async () => {
      logSink.rotateIfNeeded(options.now?.());
      await reportDiskUsage(config.logging.diskUsagePaths, diskLogger);
    },
  });

  return { ...prepared, scheduler };
}
