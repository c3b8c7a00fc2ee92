import { requireRegisters } from '../decoder/register-decoder';
import type { RawBlock } from '../decoder/register-decoder';
import { singleBlockRead } from './record';
import type { DecodedRecord, DeviceDescriptor, DeviceDriver, FieldValue, ReadRequest } from './types';

const REGISTERS_PER_LINE = 10;

/**
 * Commissioning aid: logs the raw block without interpreting it.
 * One column per configured register.
 */
export class RegisterDumpDriver implements DeviceDriver {
  readonly typeName = 'register-dump';
  readonly description = 'Raw register dump for commissioning new device types';
  readonly escalation = 'soft-fail' as const;

  minRegisters(descriptor: DeviceDescriptor): number {
    return descriptor.registerCount;
  }

  fieldNames(descriptor: DeviceDescriptor): readonly string[] {
    return Array.from(
      { length: descriptor.registerCount },
      (_, index) => `reg${String(index).padStart(3, '0')}`
    );
  }

  planRead(descriptor: DeviceDescriptor, unitId: number): ReadRequest {
    return singleBlockRead(descriptor, unitId);
  }

  decode(block: RawBlock, descriptor: DeviceDescriptor): FieldValue[] {
    requireRegisters(block, descriptor.registerCount, this.typeName);
    return block.slice(0, descriptor.registerCount);
  }

  formatForDisplay(record: DecodedRecord): string[] {
    const lines: string[] = [];
    for (let start = 0; start < record.fields.length; start += REGISTERS_PER_LINE) {
      const chunk = record.fields
        .slice(start, start + REGISTERS_PER_LINE)
        .map((field) => (field.value === null ? '-' : String(field.value)));
      lines.push(`[${String(start).padStart(4, '0')}] ${chunk.join(' ')}`);
    }
    return lines;
  }
}
