import { ConfigError } from '../errors';
import {
  bigEndian32,
  packedIdentifier,
  requireRegisters,
  scaledValue,
} from '../decoder/register-decoder';
import type { RawBlock } from '../decoder/register-decoder';
import type { DecodedRecord, DeviceDescriptor, DeviceDriver, FieldValue, ReadRequest } from './types';

export const DEFAULT_STATION_STRIDE = 40;
export const DEFAULT_PACING_DELAY_MS = 200;
export const DEFAULT_GATEWAY_UNIT_ID = 1;

// Per-inverter layout, offsets relative to the inverter's base address
const SERIAL_OFFSET = 0;
const SERIAL_REGISTERS = 8;
const TODAY_ENERGY_OFFSET = 8;
const TOTAL_ENERGY_OFFSET = 10;
const STATUS_OFFSET = 12;
const PV_STRINGS_OFFSET = 13;
const PV_STRING_STRIDE = 3;
const PV_STRING_COUNT = 4;
const REQUIRED_REGISTERS = PV_STRINGS_OFFSET + PV_STRING_STRIDE * PV_STRING_COUNT;

const PV_STRING_FIELDS = Array.from({ length: PV_STRING_COUNT }, (_, index) => {
  const prefix = `pv${index + 1}`;
  return [`${prefix}VoltageV`, `${prefix}CurrentA`, `${prefix}PowerW`];
}).flat();

const FIELD_NAMES = [
  'serialNumber',
  'todayEnergyKWh',
  'totalEnergyKWh',
  'operatingStatus',
  ...PV_STRING_FIELDS,
];

/**
 * Inverter station behind one TCP gateway. Each inverter is a logical
 * sub-device whose registers start at startAddress + stride * (index - 1);
 * all reads go to the gateway's unit id.
 *
 * A read that exhausts its retries is treated as a link failure, so the
 * escalation is hard-fail.
 */
export class MultiInverterStationDriver implements DeviceDriver {
  readonly typeName = 'multi-inverter-station';
  readonly description = 'Inverter station on a shared TCP gateway, addressed by register offset';
  readonly escalation = 'hard-fail' as const;

  minRegisters(): number {
    return REQUIRED_REGISTERS;
  }

  fieldNames(): readonly string[] {
    return FIELD_NAMES;
  }

  stride(descriptor: DeviceDescriptor): number {
    return descriptor.stride ?? DEFAULT_STATION_STRIDE;
  }

  validate(descriptor: DeviceDescriptor): void {
    const stride = this.stride(descriptor);
    if (descriptor.registerCount > stride) {
      throw new ConfigError(
        `${this.typeName}: registerCount ${descriptor.registerCount} exceeds the inverter stride ${stride}`
      );
    }
    const invalid = descriptor.unitIds.find((index) => index < 1);
    if (invalid !== undefined) {
      throw new ConfigError(`${this.typeName}: inverter index ${invalid} must be 1 or greater`);
    }
  }

  planRead(descriptor: DeviceDescriptor, unitIndex: number): ReadRequest {
    return {
      address: descriptor.startAddress + this.stride(descriptor) * (unitIndex - 1),
      count: descriptor.registerCount,
      unitId: descriptor.gatewayUnitId ?? DEFAULT_GATEWAY_UNIT_ID,
      registerType: descriptor.registerType,
    };
  }

  interReadDelayMs(descriptor: DeviceDescriptor): number {
    return descriptor.interReadDelayMs ?? DEFAULT_PACING_DELAY_MS;
  }

  decode(block: RawBlock): FieldValue[] {
    requireRegisters(block, REQUIRED_REGISTERS, this.typeName);

    const values: FieldValue[] = [
      packedIdentifier(block.slice(SERIAL_OFFSET, SERIAL_OFFSET + SERIAL_REGISTERS)),
      scaledValue(bigEndian32(block[TODAY_ENERGY_OFFSET], block[TODAY_ENERGY_OFFSET + 1]), 10, 1),
      bigEndian32(block[TOTAL_ENERGY_OFFSET], block[TOTAL_ENERGY_OFFSET + 1]),
      block[STATUS_OFFSET],
    ];

    for (let index = 0; index < PV_STRING_COUNT; index++) {
      const base = PV_STRINGS_OFFSET + index * PV_STRING_STRIDE;
      values.push(
        scaledValue(block[base], 10, 1),
        scaledValue(block[base + 1], 100, 2),
        scaledValue(block[base + 2], 10, 1)
      );
    }
    return values;
  }

  formatForDisplay(record: DecodedRecord): string[] {
    const valueOf = (name: string): string => {
      const field = record.fields.find((candidate) => candidate.name === name);
      return field?.value === null || field === undefined ? 'None' : String(field.value);
    };

    const lines = [
      `Serial number: ${valueOf('serialNumber')}`,
      `Energy today (kWh): ${valueOf('todayEnergyKWh')} | total (kWh): ${valueOf('totalEnergyKWh')}`,
      `Operating status: ${valueOf('operatingStatus')}`,
    ];
    for (let index = 1; index <= PV_STRING_COUNT; index++) {
      lines.push(
        `PV${index}: ${valueOf(`pv${index}VoltageV`)} V, ` +
          `${valueOf(`pv${index}CurrentA`)} A, ${valueOf(`pv${index}PowerW`)} W`
      );
    }
    return lines;
  }
}
