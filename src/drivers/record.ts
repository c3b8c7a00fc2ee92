/**
 * Record assembly shared by all drivers.
 *
 * Whatever happens to a read, the record carries exactly the driver's
 * field list so CSV columns stay aligned with the header.
 */

import { DecodeError, toError } from '../errors';
import type { RawBlock } from '../decoder/register-decoder';
import type {
  DecodedRecord,
  DeviceDescriptor,
  DeviceDriver,
  FieldValue,
  ReadRequest,
  RecordStatus,
} from './types';

export const LEADING_COLUMNS = ['Datetime', 'Device_ID'] as const;
export const STATUS_COLUMN = 'Error';

const STATUS_TEXT: Record<RecordStatus, string> = {
  OK: 'No error',
  DeviceError: 'Error',
  DecodeError: 'Decode error',
};

export type ReadOutcome =
  | { kind: 'block'; registers: RawBlock }
  | { kind: 'failed'; error: Error };

export type CsvCell = string | number | null;

export function headerFor(driver: DeviceDriver, descriptor: DeviceDescriptor): string[] {
  return [...LEADING_COLUMNS, ...driver.fieldNames(descriptor), STATUS_COLUMN];
}

/**
 * Read request for drivers that read the same block from every unit id.
 */
export function singleBlockRead(descriptor: DeviceDescriptor, unitId: number): ReadRequest {
  return {
    address: descriptor.startAddress,
    count: descriptor.registerCount,
    unitId,
    registerType: descriptor.registerType,
  };
}

export function emptyRecord(
  driver: DeviceDriver,
  descriptor: DeviceDescriptor,
  unitId: number,
  status: Exclude<RecordStatus, 'OK'>,
  error: string,
  timestamp: Date
): DecodedRecord {
  return {
    timestamp,
    unitId,
    status,
    error,
    fields: driver.fieldNames(descriptor).map((name) => ({ name, value: null })),
  };
}

export function buildRecord(
  driver: DeviceDriver,
  descriptor: DeviceDescriptor,
  unitId: number,
  outcome: ReadOutcome,
  timestamp: Date = new Date()
): DecodedRecord {
  if (outcome.kind === 'failed') {
    return emptyRecord(driver, descriptor, unitId, 'DeviceError', outcome.error.message, timestamp);
  }

  const names = driver.fieldNames(descriptor);
  let values: readonly FieldValue[];
  try {
    values = driver.decode(outcome.registers, descriptor);
    if (values.length !== names.length) {
      throw new DecodeError(
        `${driver.typeName} decoded ${values.length} values for ${names.length} fields`
      );
    }
  } catch (error) {
    const cause = toError(error);
    const decodeError = cause instanceof DecodeError ? cause : new DecodeError(cause.message, { cause });
    return emptyRecord(driver, descriptor, unitId, 'DecodeError', decodeError.message, timestamp);
  }

  return {
    timestamp,
    unitId,
    status: 'OK',
    fields: names.map((name, index) => ({ name, value: values[index] })),
  };
}

export function statusText(status: RecordStatus): string {
  return STATUS_TEXT[status];
}

export function toRow(record: DecodedRecord): CsvCell[] {
  return [
    record.timestamp.toISOString(),
    record.unitId,
    ...record.fields.map((field) => field.value),
    statusText(record.status),
  ];
}

/**
 * One "name: value" line per field.
 */
export function defaultDisplay(record: DecodedRecord): string[] {
  return record.fields.map((field) => `${field.name}: ${field.value === null ? 'None' : String(field.value)}`);
}
