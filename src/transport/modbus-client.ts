import ModbusRTU from 'modbus-serial';
import type { TransportConfig } from '../config/types';
import type { ReadRequest } from '../drivers/types';
import { TransportError } from '../errors';
import type { Logger } from '../logging/types';
import type { ModbusConnection } from './types';

/**
 * Modbus client wrapper for serial RTU and TCP links.
 * Framing, CRC and per-request timeouts are handled by modbus-serial.
 */
export class ModbusClient implements ModbusConnection {
  private client: ModbusRTU;
  private config: TransportConfig;
  private logger: Logger;
  private connected = false;

  constructor(config: TransportConfig, logger: Logger) {
    this.config = config;
    this.logger = logger;
    this.client = new ModbusRTU();
    this.setupErrorHandlers();
  }

  get isOpen(): boolean {
    return this.connected && this.client.isOpen;
  }

  /**
   * Open the link described by the transport configuration
   */
  async connect(): Promise<void> {
    const { config } = this;
    const target = config.type === 'tcp' ? `${config.host}:${config.port}` : config.serialPort;

    try {
      this.logger.info(`Connecting to Modbus ${config.type} link: ${target}`);

      switch (config.type) {
        case 'tcp':
          await this.client.connectTCP(config.host, { port: config.port });
          break;

        case 'serial':
          await this.client.connectRTUBuffered(config.serialPort, {
            baudRate: config.baudRate,
            dataBits: config.dataBits,
            stopBits: config.stopBits,
            parity: config.parity,
          });
          break;
      }

      this.client.setTimeout(config.timeout);
      this.connected = true;
      this.logger.info(`Connected to Modbus ${config.type} link: ${target}`);

    } catch (error) {
      this.connected = false;
      const errorMessage = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to connect to Modbus link ${target}: ${errorMessage}`);
      throw new TransportError(`Failed to connect to ${target}: ${errorMessage}`, { cause: error });
    }
  }

  async readRegisters(request: ReadRequest): Promise<number[]> {
    this.client.setID(request.unitId);
    const result =
      request.registerType === 'input'
        ? await this.client.readInputRegisters(request.address, request.count)
        : await this.client.readHoldingRegisters(request.address, request.count);
    return result.data;
  }

  /**
   * Close the link. Safe to call on a link that never opened.
   */
  async close(): Promise<void> {
    if (!this.client.isOpen) {
      this.connected = false;
      return;
    }

    this.connected = false;
    await new Promise<void>((resolve) => {
      this.client.close(() => resolve());
    });
    this.logger.info('Modbus link closed');
  }

  /**
   * Port errors arrive as events, outside any pending request. The link is
   * marked closed so later reads fail as TransportError.
   */
  private setupErrorHandlers(): void {
    this.client.on('error', (error: unknown) => {
      const errorMessage = error instanceof Error ? error.message : String(error);
      this.logger.error(`Modbus link error: ${errorMessage}`);
      this.connected = false;
    });

    this.client.on('close', () => {
      if (this.connected) {
        this.logger.warn('Modbus link closed unexpectedly');
      }
      this.connected = false;
    });
  }
}
