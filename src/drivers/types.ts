import type { RawBlock } from '../decoder/register-decoder';

export type RegisterType = 'holding' | 'input';

/**
 * soft-fail: exhausted retries produce a DeviceError row and the cycle continues.
 * hard-fail: exhausted retries end the process.
 */
export type EscalationPolicy = 'soft-fail' | 'hard-fail';

/**
 * Immutable description of the polled device, built once from configuration.
 */
export interface DeviceDescriptor {
  readonly typeName: string;
  readonly startAddress: number;
  readonly registerCount: number;
  readonly unitIds: readonly number[];
  readonly registerType: RegisterType;
  /** Modbus unit id of the gateway for drivers that address sub-devices by offset */
  readonly gatewayUnitId?: number;
  /** Register distance between consecutive sub-devices */
  readonly stride?: number;
  readonly interReadDelayMs?: number;
  readonly escalation?: EscalationPolicy;
}

export interface ReadRequest {
  address: number;
  count: number;
  unitId: number;
  registerType: RegisterType;
}

export type FieldValue = number | string;

export interface DecodedField {
  readonly name: string;
  readonly value: FieldValue | null;
}

export type RecordStatus = 'OK' | 'DeviceError' | 'DecodeError';

export interface DecodedRecord {
  readonly timestamp: Date;
  readonly unitId: number;
  readonly fields: readonly DecodedField[];
  readonly status: RecordStatus;
  readonly error?: string;
}

/**
 * One implementation per instrument model.
 */
export interface DeviceDriver {
  readonly typeName: string;
  readonly description: string;
  readonly escalation: EscalationPolicy;

  /** Registers a block must contain for decode() to succeed */
  minRegisters(descriptor: DeviceDescriptor): number;

  /** Output field names, in column order */
  fieldNames(descriptor: DeviceDescriptor): readonly string[];

  planRead(descriptor: DeviceDescriptor, unitId: number): ReadRequest;

  /**
   * Values in fieldNames() order. Throws DecodeError on a block it cannot decode.
   */
  decode(block: RawBlock, descriptor: DeviceDescriptor): readonly FieldValue[];

  /** Pause between consecutive unit reads in one cycle */
  interReadDelayMs?(descriptor: DeviceDescriptor): number;

  /** Human readable lines for the console log */
  formatForDisplay?(record: DecodedRecord): string[];

  /** Extra startup checks on the descriptor; throws ConfigError */
  validate?(descriptor: DeviceDescriptor): void;
}
