/**
 * Register decoding helpers shared by all device drivers.
 * Registers are unsigned 16-bit words transmitted big-endian.
 */

import { DecodeError } from '../errors';

export type RawBlock = readonly number[];

/**
 * Combine a high and low register into an unsigned 32-bit integer.
 */
export function bigEndian32(hi: number, lo: number): number {
  return ((hi << 16) | lo) >>> 0;
}

/**
 * Reinterpret one register as a two's complement 16-bit integer.
 */
export function signed16(value: number): number {
  const word = value & 0xffff;
  return word & 0x8000 ? word - 0x10000 : word;
}

/**
 * IEEE-754 binary32 from two registers, bytes ordered hi.hi hi.lo lo.hi lo.lo.
 */
export function ieee754FromRegisters(hi: number, lo: number): number {
  const view = new DataView(new ArrayBuffer(4));
  view.setUint16(0, hi & 0xffff, false);
  view.setUint16(2, lo & 0xffff, false);
  return view.getFloat32(0, false);
}

/**
 * round(raw / divisor, precision); a null reading stays null.
 */
export function scaledValue(raw: number, divisor: number, precision: number): number;
export function scaledValue(raw: number | null, divisor: number, precision: number): number | null;
export function scaledValue(raw: number | null, divisor: number, precision: number): number | null {
  if (raw === null) {
    return null;
  }
  return roundTo(raw / divisor, precision);
}

export function roundTo(value: number, precision: number): number {
  if (!Number.isFinite(value)) {
    return value;
  }
  return Number(value.toFixed(precision));
}

/**
 * Lowercase hex of each register as two big-endian bytes, e.g. [0x4142, 0x0001] -> "41420001".
 */
export function packedIdentifier(registers: RawBlock): string {
  return registers.map((register) => (register & 0xffff).toString(16).padStart(4, '0')).join('');
}

/**
 * Drivers call this before indexing into a block.
 */
export function requireRegisters(block: RawBlock, needed: number, model: string): void {
  if (block.length < needed) {
    throw new DecodeError(`${model} needs ${needed} registers, got ${block.length}`);
  }
}
