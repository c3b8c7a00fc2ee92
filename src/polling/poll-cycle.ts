import type { RawBlock } from '../decoder/register-decoder';
import type { DriverRegistry } from '../drivers/driver-registry';
import { buildRecord, defaultDisplay, ReadOutcome } from '../drivers/record';
import type { DecodedRecord, DeviceDescriptor, DeviceDriver, EscalationPolicy } from '../drivers/types';
import type { Logger } from '../logging/types';
import type { TransportReader } from '../transport/transport-reader';
import { sleep as defaultSleep, Sleep } from '../utils/sleep';
import type { RetryPolicy } from './retry-policy';

export interface PollCycleResult {
  /** One record per unit id visited, in declared order */
  records: DecodedRecord[];
  /** Cancellation was observed before every unit was visited */
  interrupted: boolean;
}

export interface PollCycleOptions {
  registry: DriverRegistry;
  reader: TransportReader;
  retryPolicy: RetryPolicy;
  logger: Logger;
  sleep?: Sleep;
  now?: () => Date;
  isCancelled?: () => boolean;
}

export function escalationFor(driver: DeviceDriver, descriptor: DeviceDescriptor): EscalationPolicy {
  return descriptor.escalation ?? driver.escalation;
}

/**
 * One pass over the configured unit ids. Units are read one after another,
 * never concurrently: most links are half-duplex serial buses.
 *
 * A hard-fail escalation surfaces as a thrown ExhaustedRetriesError.
 */
export class PollCycle {
  private readonly registry: DriverRegistry;
  private readonly reader: TransportReader;
  private readonly retryPolicy: RetryPolicy;
  private readonly logger: Logger;
  private readonly sleep: Sleep;
  private readonly now: () => Date;
  private readonly isCancelled: () => boolean;

  constructor(options: PollCycleOptions) {
    this.registry = options.registry;
    this.reader = options.reader;
    this.retryPolicy = options.retryPolicy;
    this.logger = options.logger;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());
    this.isCancelled = options.isCancelled ?? (() => false);
  }

  async run(descriptor: DeviceDescriptor): Promise<PollCycleResult> {
    const driver = this.registry.resolve(descriptor.typeName);
    const records: DecodedRecord[] = [];
    const pacingMs = driver.interReadDelayMs?.(descriptor) ?? 0;

    for (const [index, unitId] of descriptor.unitIds.entries()) {
      if (this.isCancelled()) {
        this.logger.info(`Cycle interrupted after ${records.length}/${descriptor.unitIds.length} unit(s)`);
        return { records, interrupted: true };
      }
      if (index > 0 && pacingMs > 0) {
        await this.sleep(pacingMs);
      }
      records.push(await this.pollUnit(driver, descriptor, unitId));
    }

    return { records, interrupted: false };
  }

  private async pollUnit(driver: DeviceDriver, descriptor: DeviceDescriptor, unitId: number): Promise<DecodedRecord> {
    const request = driver.planRead(descriptor, unitId);
    const target = `${driver.typeName} unit ${unitId}`;
    this.logger.info(`Reading ${target} (address ${request.address}, ${request.count} registers)`);

    const result = await this.retryPolicy.execute<RawBlock>(
      () => this.reader.readBlock(request.address, request.count, request.unitId, request.registerType),
      target,
      escalationFor(driver, descriptor)
    );

    let outcome: ReadOutcome;
    if (result.ok) {
      this.logger.debug(`Raw registers (${result.value.length}): ${result.value.join(',')}`);
      outcome = { kind: 'block', registers: result.value };
    } else {
      outcome = { kind: 'failed', error: result.error };
    }

    const record = buildRecord(driver, descriptor, unitId, outcome, this.now());
    this.logRecord(driver, record);
    return record;
  }

  private logRecord(driver: DeviceDriver, record: DecodedRecord): void {
    if (record.status !== 'OK') {
      this.logger.warn(`Unit ${record.unitId}: ${record.status} (${record.error ?? 'unknown error'})`);
      return;
    }
    const lines = driver.formatForDisplay ? driver.formatForDisplay(record) : defaultDisplay(record);
    for (const line of lines) {
      this.logger.info(line, { unitId: record.unitId });
    }
  }
}
