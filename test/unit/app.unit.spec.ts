/**
 * Unit tests for the composition root
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createApp, prepareDevice } from '../../src/app';
import { ConfigLoader } from '../../src/config/config-loader';
import type { AppConfig, AppConfigInput, TransportConfig } from '../../src/config/types';
import { createDefaultRegistry } from '../../src/drivers/driver-registry';
import { ConfigError, EXIT_CODES } from '../../src/errors';
import { LogSink } from '../../src/logging/log-sink';
import type { Logger } from '../../src/logging/types';
import type { ModbusConnection } from '../../src/transport/types';
import { energyMeterBlock, FakeConnection, instantSleep, MemorySink } from '../helpers';

const NOW = new Date(2024, 2, 5, 10, 0, 0);

describe('app', () => {
  let baseFolder: string;
  let logSink: LogSink;

  function configWith(device: Partial<AppConfigInput['device']> = {}, header?: string[]): AppConfig {
    return ConfigLoader.validate({
      transport: { type: 'tcp', host: '127.0.0.1', retryAttempts: 2, retryDelay: 0 },
      device: { typeName: 'energy-meter', startAddress: 0, registerCount: 26, unitIdRange: [1, 2], ...device },
      logging: { baseFolder, fileSuffix: 'test_log', cycleIntervalSeconds: 1, console: false, header },
    });
  }

  beforeEach(() => {
    baseFolder = fs.mkdtempSync(path.join(os.tmpdir(), 'field-logger-app-'));
    logSink = new LogSink({ baseFolder, retentionDays: 30, level: 'info', console: false });
    logSink.rotateIfNeeded(NOW);
  });

  afterEach(async () => {
    await logSink.close();
    fs.rmSync(baseFolder, { recursive: true, force: true });
  });

  describe('prepareDevice', () => {
    it('resolves the driver and its header', () => {
      const prepared = prepareDevice(configWith(), createDefaultRegistry());

      expect(prepared.driver.typeName).toBe('energy-meter');
      expect(prepared.header).toEqual([
        'Datetime',
        'Device_ID',
        'forwardEnergyKWh',
        'activePowerKW',
        'currentA',
        'voltageV',
        'Error',
      ]);
      expect(prepared.descriptor.unitIds).toEqual([1, 2]);
      expect(Object.isFrozen(prepared.descriptor)).toBe(true);
    });

    it('rejects a register count below what the driver decodes', () => {
      expect(() => prepareDevice(configWith({ registerCount: 10 }), createDefaultRegistry())).toThrow(
        'energy-meter needs registerCount >= 26, configured 10'
      );
    });

    it('accepts a configured header equal to the driver header', () => {
      const header = ['Datetime', 'Device_ID', 'forwardEnergyKWh', 'activePowerKW', 'currentA', 'voltageV', 'Error'];
      expect(() => prepareDevice(configWith({}, header), createDefaultRegistry())).not.toThrow();
    });

    it('rejects a configured header that differs from the driver header', () => {
      expect(() =>
        prepareDevice(configWith({}, ['Datetime', 'Device_ID', 'kWh', 'Error']), createDefaultRegistry())
      ).toThrow(ConfigError);
    });

    it('rejects station reads running past the address space', () => {
      const config = configWith({
        typeName: 'multi-inverter-station',
        startAddress: 65500,
        registerCount: 25,
        unitIdRange: [1, 2],
      });

      expect(() => prepareDevice(config, createDefaultRegistry())).toThrow(
        'Read for unit 2 (address 65540, 25 registers) is out of range'
      );
    });
  });

  describe('createApp', () => {
    function connectTo(connection: ModbusConnection) {
      return jest.fn((_config: TransportConfig, _logger: Logger) => Promise.resolve(connection));
    }

    it('fails on an unknown device type before connecting', async () => {
      const connect = connectTo(new FakeConnection(() => []));

      await expect(createApp(configWith({ typeName: 'nope' }), logSink, { connect })).rejects.toBeInstanceOf(
        ConfigError
      );
      expect(connect).not.toHaveBeenCalled();
    });

    it('polls every configured unit and closes the link', async () => {
      const connection = new FakeConnection(() => energyMeterBlock());
      const connect = connectTo(connection);
      const sink = new MemorySink();
      const config = configWith();

      const app = await createApp(config, logSink, {
        connect,
        sink,
        maxCycles: 1,
        sleep: instantSleep(),
        now: () => NOW,
      });

      await expect(app.scheduler.runForever()).resolves.toBe(EXIT_CODES.OK);
      expect(connect).toHaveBeenCalledWith(config.transport, expect.anything());
      expect(sink.batches).toHaveLength(1);
      expect(sink.batches[0].map((record) => record.unitId)).toEqual([1, 2]);
      expect(sink.batches[0][0].timestamp).toBe(NOW);
      expect(connection.closeCalls).toBe(1);
    });

    it('writes CSV rows under the configured base folder by default', async () => {
      const connection = new FakeConnection(() => energyMeterBlock());
      const app = await createApp(configWith({ unitIdRange: [4] }), logSink, {
        connect: connectTo(connection),
        maxCycles: 1,
        sleep: instantSleep(),
        now: () => NOW,
      });

      await app.scheduler.runForever();

      const csv = fs.readFileSync(path.join(baseFolder, '2024-03', '2024-03-05_test_log.csv'), 'utf8');
      expect(csv).toBe(
        'Datetime,Device_ID,forwardEnergyKWh,activePowerKW,currentA,voltageV,Error\n' +
          `${NOW.toISOString()},4,1,500,1.2345,5,No error\n`
      );
    });
  });
});
