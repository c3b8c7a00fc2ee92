import { bigEndian32, requireRegisters, scaledValue } from '../decoder/register-decoder';
import type { RawBlock } from '../decoder/register-decoder';
import { singleBlockRead } from './record';
import type { DeviceDescriptor, DeviceDriver, FieldValue, ReadRequest } from './types';

interface Channel {
  name: string;
  offset: number;
  divisor: number;
  precision: number;
}

// 32-bit big-endian pairs; offsets relative to the start of the block
const CHANNELS: readonly Channel[] = [
  { name: 'forwardEnergyKWh', offset: 0, divisor: 100, precision: 3 },
  { name: 'activePowerKW', offset: 20, divisor: 1000, precision: 3 },
  { name: 'currentA', offset: 22, divisor: 10000, precision: 4 },
  { name: 'voltageV', offset: 24, divisor: 10000, precision: 1 },
];

const FIELD_NAMES = CHANNELS.map((channel) => channel.name);
const REQUIRED_REGISTERS = 26;

/**
 * DC energy meter (DCM3366 register map).
 */
export class EnergyMeterDriver implements DeviceDriver {
  readonly typeName = 'energy-meter';
  readonly description = 'DC energy meter: forward energy, active power, current, voltage';
  readonly escalation = 'soft-fail' as const;

  minRegisters(): number {
    return REQUIRED_REGISTERS;
  }

  fieldNames(): readonly string[] {
    return FIELD_NAMES;
  }

  planRead(descriptor: DeviceDescriptor, unitId: number): ReadRequest {
    return singleBlockRead(descriptor, unitId);
  }

  decode(block: RawBlock): FieldValue[] {
    requireRegisters(block, REQUIRED_REGISTERS, this.typeName);
    return CHANNELS.map((channel) => {
      const raw = bigEndian32(block[channel.offset], block[channel.offset + 1]);
      return scaledValue(raw, channel.divisor, channel.precision);
    });
  }
}
