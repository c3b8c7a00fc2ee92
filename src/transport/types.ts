import type { ReadRequest } from '../drivers/types';

/**
 * The process-wide Modbus link. Owned by the PollScheduler, which is the
 * only component allowed to close it.
 */
export interface ModbusConnection {
  readonly isOpen: boolean;
  readRegisters(request: ReadRequest): Promise<number[]>;
  close(): Promise<void>;
}

/** Protocol limit for one FC3/FC4 request */
export const MAX_REGISTERS_PER_READ = 125;
