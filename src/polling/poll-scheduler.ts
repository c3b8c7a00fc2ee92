/**
 * POLL SCHEDULER
 * ==============
 *
 * Runs PollCycle at a fixed interval until stopped and hands every cycle's
 * records to the output sink.
 *
 * The scheduler owns the Modbus connection: it builds the TransportReader
 * around it and closes it exactly once, whichever way the loop ends.
 * stop() is cooperative. It wakes the wait between cycles and is otherwise
 * observed between unit reads; a read in flight always finishes first.
 */

import type { DriverRegistry } from '../drivers/driver-registry';
import type { DeviceDescriptor } from '../drivers/types';
import { EXIT_CODES, ExhaustedRetriesError, ExitCode, toError } from '../errors';
import type { Logger } from '../logging/types';
import type { OutputSink } from '../output/csv-sink';
import { TransportReader } from '../transport/transport-reader';
import type { ModbusConnection } from '../transport/types';
import { sleep as defaultSleep, Sleep } from '../utils/sleep';
import { PollCycle } from './poll-cycle';
import type { RetryPolicy } from './retry-policy';

export interface PollSchedulerOptions {
  descriptor: DeviceDescriptor;
  header: readonly string[];
  connection: ModbusConnection;
  registry: DriverRegistry;
  retryPolicy: RetryPolicy;
  sink: OutputSink;
  logger: Logger;
  cycleIntervalMs: number;
  /** Stop by itself after this many cycles */
  maxCycles?: number;
  /** Called before each wait, e.g. for log rotation and disk reports */
  onCycleStart?: () => Promise<void>;
  sleep?: Sleep;
  now?: () => Date;
}

export class PollScheduler {
  private readonly options: PollSchedulerOptions;
  private readonly logger: Logger;
  private readonly sleep: Sleep;
  private readonly cycle: PollCycle;
  private readonly abortController = new AbortController();
  private stopRequested = false;
  private running = false;
  private transportClosed = false;
  private cyclesCompleted = 0;

  constructor(options: PollSchedulerOptions) {
    this.options = options;
    this.logger = options.logger;
    this.sleep = options.sleep ?? defaultSleep;
    this.cycle = new PollCycle({
      registry: options.registry,
      reader: new TransportReader(options.connection),
      retryPolicy: options.retryPolicy,
      logger: options.logger,
      sleep: this.sleep,
      now: options.now,
      isCancelled: () => this.stopRequested,
    });
  }

  get completedCycles(): number {
    return this.cyclesCompleted;
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Request a graceful stop
   */
  stop(): void {
    if (this.stopRequested) {
      return;
    }
    this.stopRequested = true;
    this.logger.info('Stop requested; finishing current read');
    this.abortController.abort();
  }

  /**
   * Poll until stopped. Resolves with the process exit code.
   */
  async runForever(): Promise<ExitCode> {
    if (this.running) {
      throw new Error('PollScheduler is already running');
    }
    this.running = true;

    const { descriptor, header, sink, cycleIntervalMs, maxCycles, onCycleStart } = this.options;
    let exitCode: ExitCode = EXIT_CODES.OK;

    try {
      while (!this.stopRequested && (maxCycles === undefined || this.cyclesCompleted < maxCycles)) {
        if (onCycleStart) {
          await onCycleStart();
        }

        this.logger.info(`Waiting ${cycleIntervalMs / 1000} seconds before next read cycle`);
        await this.sleep(cycleIntervalMs, this.abortController.signal);
        if (this.stopRequested) {
          break;
        }

        const result = await this.cycle.run(descriptor);
        await sink.appendRecords(header, result.records);
        this.cyclesCompleted++;

        if (result.interrupted) {
          break;
        }
      }
    } catch (error) {
      if (!(error instanceof ExhaustedRetriesError && error.fatal)) {
        throw error;
      }
      this.logger.error(`Fatal link failure, stopping: ${error.message}`);
      exitCode = EXIT_CODES.HARD_FAIL;
    } finally {
      await this.shutdown();
      this.running = false;
    }

    this.logger.info(`Polling stopped after ${this.cyclesCompleted} cycle(s)`);
    return exitCode;
  }

  private async shutdown(): Promise<void> {
    if (!this.transportClosed) {
      this.transportClosed = true;
      try {
        await this.options.connection.close();
      } catch (error) {
        this.logger.error(`Error closing Modbus link: ${toError(error).message}`);
      }
    }
    await this.options.sink.close();
  }
}
