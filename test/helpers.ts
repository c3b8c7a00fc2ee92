/**
 * In-process stand-ins shared by the unit tests
 */

import type { DecodedRecord, ReadRequest } from '../src/drivers/types';
import type { Logger } from '../src/logging/types';
import type { OutputSink } from '../src/output/csv-sink';
import type { ModbusConnection } from '../src/transport/types';

export function createTestLogger(): jest.Mocked<Logger> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

export function instantSleep() {
  return jest.fn((_ms: number, _signal?: AbortSignal) => Promise.resolve());
}

/**
 * Modbus link answering from a callback. Throwing in the callback
 * behaves like a timed out request.
 */
export class FakeConnection implements ModbusConnection {
  isOpen = true;
  closeCalls = 0;
  readonly requests: ReadRequest[] = [];

  constructor(private readonly respond: (request: ReadRequest) => number[]) {}

  async readRegisters(request: ReadRequest): Promise<number[]> {
    this.requests.push(request);
    return this.respond(request);
  }

  async close(): Promise<void> {
    this.closeCalls++;
    this.isOpen = false;
  }
}

export class MemorySink implements OutputSink {
  readonly batches: DecodedRecord[][] = [];
  readonly headers: string[][] = [];
  closeCalls = 0;

  async appendRecords(header: readonly string[], records: readonly DecodedRecord[]): Promise<void> {
    this.headers.push([...header]);
    this.batches.push([...records]);
  }

  async close(): Promise<void> {
    this.closeCalls++;
  }
}

/**
 * A 26-register energy meter block:
 * 1.0 kWh, 500 kW, 1.2345 A, 5.0 V
 */
export function energyMeterBlock(): number[] {
  const block = new Array<number>(26).fill(0);
  block[1] = 100;
  block[20] = 7;
  block[21] = 41248; // 7 * 65536 + 41248 = 500000
  block[23] = 12345;
  block[25] = 50000;
  return block;
}

/** The two registers holding a big-endian float32 */
export function floatRegisters(value: number): [number, number] {
  const buffer = Buffer.alloc(4);
  buffer.writeFloatBE(value, 0);
  return [buffer.readUInt16BE(0), buffer.readUInt16BE(2)];
}
