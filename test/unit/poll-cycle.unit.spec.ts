/**
 * Unit tests for PollCycle
 */

import { createDefaultRegistry } from '../../src/drivers/driver-registry';
import type { DeviceDescriptor } from '../../src/drivers/types';
import { ExhaustedRetriesError } from '../../src/errors';
import { PollCycle, PollCycleOptions } from '../../src/polling/poll-cycle';
import { RetryPolicy } from '../../src/polling/retry-policy';
import { TransportReader } from '../../src/transport/transport-reader';
import { createTestLogger, energyMeterBlock, FakeConnection, instantSleep } from '../helpers';

const NOW = new Date('2024-03-05T10:00:00.000Z');

const meters: DeviceDescriptor = {
  typeName: 'energy-meter',
  startAddress: 0,
  registerCount: 26,
  unitIds: [3, 1, 2],
  registerType: 'holding',
};

const station: DeviceDescriptor = {
  typeName: 'multi-inverter-station',
  startAddress: 0,
  registerCount: 25,
  unitIds: [1, 2, 3],
  registerType: 'holding',
};

function createCycle(connection: FakeConnection, overrides: Partial<PollCycleOptions> = {}) {
  const logger = createTestLogger();
  const retrySleep = instantSleep();
  const cycleSleep = instantSleep();
  const cycle = new PollCycle({
    registry: createDefaultRegistry(),
    reader: new TransportReader(connection),
    retryPolicy: new RetryPolicy({ maxAttempts: 2, backoffMs: 100, logger, sleep: retrySleep }),
    logger,
    sleep: cycleSleep,
    now: () => NOW,
    ...overrides,
  });
  return { cycle, logger, retrySleep, cycleSleep };
}

describe('PollCycle', () => {
  it('reads every unit once, in declared order', async () => {
    const connection = new FakeConnection(() => energyMeterBlock());
    const { cycle } = createCycle(connection);

    const result = await cycle.run(meters);

    expect(result.interrupted).toBe(false);
    expect(result.records.map((record) => record.unitId)).toEqual([3, 1, 2]);
    expect(connection.requests.map((request) => request.unitId)).toEqual([3, 1, 2]);
    expect(result.records.every((record) => record.status === 'OK')).toBe(true);
    expect(result.records[0].timestamp).toBe(NOW);
    expect(result.records[0].fields.map((field) => field.value)).toEqual([1, 500, 1.2345, 5]);
  });

  it('records a device error for a silent unit and carries on', async () => {
    const connection = new FakeConnection((request) => {
      if (request.unitId === 1) {
        throw new Error('Timed out');
      }
      return energyMeterBlock();
    });
    const { cycle, logger } = createCycle(connection);

    const result = await cycle.run(meters);

    expect(result.records.map((record) => record.status)).toEqual(['OK', 'DeviceError', 'OK']);
    expect(result.records[1].fields.every((field) => field.value === null)).toBe(true);
    expect(result.records[1].fields).toHaveLength(4);
    expect(connection.requests).toHaveLength(4);
    expect(logger.warn).toHaveBeenCalledWith(
      'Unit 1: DeviceError (Read of energy-meter unit 1 failed after 2 attempt(s): Read of unit 1 @0x26 failed: Timed out)'
    );
  });

  it('records a decode error without retrying', async () => {
    const connection = new FakeConnection(() => new Array<number>(26).fill(0));
    const temperatures: DeviceDescriptor = { ...meters, typeName: 'temperature-logger', unitIds: [4] };
    const { cycle } = createCycle(connection);

    const result = await cycle.run(temperatures);

    expect(result.records[0].status).toBe('DecodeError');
    expect(result.records[0].error).toBe('temperature-logger needs 48 registers, got 26');
    expect(connection.requests).toHaveLength(1);
  });

  it('paces station reads without pausing before the first one', async () => {
    const connection = new FakeConnection(() => new Array<number>(25).fill(0));
    const { cycle, cycleSleep } = createCycle(connection);

    await cycle.run(station);

    expect(cycleSleep.mock.calls).toEqual([[200], [200]]);
    expect(connection.requests.map((request) => request.address)).toEqual([0, 40, 80]);
    expect(connection.requests.every((request) => request.unitId === 1)).toBe(true);
  });

  it('does not pace soft-fail meters', async () => {
    const connection = new FakeConnection(() => energyMeterBlock());
    const { cycle, cycleSleep } = createCycle(connection);

    await cycle.run(meters);

    expect(cycleSleep).not.toHaveBeenCalled();
  });

  it('propagates a hard-fail escalation', async () => {
    const connection = new FakeConnection(() => {
      throw new Error('ECONNRESET');
    });
    const { cycle } = createCycle(connection);

    await expect(cycle.run(station)).rejects.toBeInstanceOf(ExhaustedRetriesError);
    expect(connection.requests).toHaveLength(2);
  });

  it('lets the descriptor override the driver escalation', async () => {
    const connection = new FakeConnection(() => {
      throw new Error('Timed out');
    });
    const { cycle } = createCycle(connection);

    await expect(cycle.run({ ...meters, escalation: 'hard-fail' })).rejects.toMatchObject({ fatal: true });
  });

  it('stops between units once cancelled', async () => {
    const connection = new FakeConnection(() => energyMeterBlock());
    const { cycle } = createCycle(connection, { isCancelled: () => connection.requests.length >= 1 });

    const result = await cycle.run(meters);

    expect(result.interrupted).toBe(true);
    expect(result.records.map((record) => record.unitId)).toEqual([3]);
  });
});
