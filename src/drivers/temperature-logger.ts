import { ieee754FromRegisters, requireRegisters, roundTo } from '../decoder/register-decoder';
import type { RawBlock } from '../decoder/register-decoder';
import { singleBlockRead } from './record';
import type { DecodedRecord, DeviceDescriptor, DeviceDriver, FieldValue, ReadRequest } from './types';

const CHANNEL_COUNT = 24;
const CHANNELS_PER_LINE = 6;
const REQUIRED_REGISTERS = CHANNEL_COUNT * 2;

const FIELD_NAMES = Array.from(
  { length: CHANNEL_COUNT },
  (_, index) => `ch${String(index + 1).padStart(2, '0')}TempC`
);

/**
 * 24-channel temperature data logger (TP-700). Each channel is a
 * big-endian float32 spread over two registers.
 */
export class TemperatureLoggerDriver implements DeviceDriver {
  readonly typeName = 'temperature-logger';
  readonly description = '24-channel temperature logger, float32 per channel';
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
    const temperatures: number[] = [];
    for (let channel = 0; channel < CHANNEL_COUNT; channel++) {
      temperatures.push(roundTo(ieee754FromRegisters(block[2 * channel], block[2 * channel + 1]), 2));
    }
    return temperatures;
  }

  formatForDisplay(record: DecodedRecord): string[] {
    const lines: string[] = [];
    for (let start = 0; start < record.fields.length; start += CHANNELS_PER_LINE) {
      lines.push(
        record.fields
          .slice(start, start + CHANNELS_PER_LINE)
          .map((field, offset) => {
            const label = `CH${String(start + offset + 1).padStart(2, '0')}`;
            return typeof field.value === 'number'
              ? `${label}: ${field.value.toFixed(2)} °C`
              : `${label}: None`;
          })
          .join('  ')
      );
    }
    return lines;
  }
}
