import type { RawBlock } from '../decoder/register-decoder';
import type { RegisterType } from '../drivers/types';
import { ConfigError, TransportError } from '../errors';
import { MAX_REGISTERS_PER_READ, ModbusConnection } from './types';

/**
 * Single-block reads over the shared connection. Any failure of the read
 * itself, including a response shorter than requested, is a TransportError.
 */
export class TransportReader {
  constructor(private readonly connection: ModbusConnection) {}

  async readBlock(
    address: number,
    count: number,
    unitId: number,
    registerType: RegisterType = 'holding'
  ): Promise<RawBlock> {
    if (count < 1 || count > MAX_REGISTERS_PER_READ) {
      throw new ConfigError(`Register count ${count} outside 1..${MAX_REGISTERS_PER_READ}`);
    }
    if (address < 0 || address + count > 0x10000) {
      throw new ConfigError(`Register range ${address}+${count} outside the 16-bit address space`);
    }
    if (unitId < 0 || unitId > 255) {
      throw new ConfigError(`Unit id ${unitId} outside 0..255`);
    }
    if (!this.connection.isOpen) {
      throw new TransportError('Modbus link is not open');
    }

    let registers: number[];
    try {
      registers = await this.connection.readRegisters({ address, count, unitId, registerType });
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new TransportError(`Read of unit ${unitId} @${address}x${count} failed: ${errorMessage}`, {
        cause: error,
      });
    }

    if (!Array.isArray(registers) || registers.length < count) {
      const received = Array.isArray(registers) ? registers.length : 0;
      throw new TransportError(`Short response from unit ${unitId}: ${received}/${count} registers`);
    }
    return registers.slice(0, count);
  }
}
