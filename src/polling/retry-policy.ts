/**
 * RETRY POLICY
 * ============
 *
 * Bounded attempts with a constant delay between them. Once the attempts
 * are used up the escalation policy of the call site decides:
 *   - soft-fail: an outcome with ok=false, the caller writes an error row
 *   - hard-fail: ExhaustedRetriesError (fatal) is thrown and ends the process
 *
 * Only TransportError is retried; anything else propagates immediately.
 */

import type { EscalationPolicy } from '../drivers/types';
import { ExhaustedRetriesError, TransportError } from '../errors';
import type { Logger } from '../logging/types';
import { sleep as defaultSleep, Sleep } from '../utils/sleep';

export interface RetryState {
  attempt: number;
  maxAttempts: number;
  backoffMs: number;
  lastError?: string;
}

export interface RetryPolicyOptions {
  maxAttempts: number;
  backoffMs: number;
  logger: Logger;
  sleep?: Sleep;
}

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: ExhaustedRetriesError };

export class RetryPolicy {
  readonly maxAttempts: number;
  readonly backoffMs: number;
  private readonly logger: Logger;
  private readonly sleep: Sleep;

  constructor(options: RetryPolicyOptions) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${options.maxAttempts}`);
    }
    if (options.backoffMs < 0) {
      throw new RangeError(`backoffMs must not be negative, got ${options.backoffMs}`);
    }
    this.maxAttempts = options.maxAttempts;
    this.backoffMs = options.backoffMs;
    this.logger = options.logger;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async execute<T>(
    operation: (state: Readonly<RetryState>) => Promise<T>,
    target: string,
    escalation: EscalationPolicy
  ): Promise<RetryOutcome<T>> {
    const state: RetryState = {
      attempt: 0,
      maxAttempts: this.maxAttempts,
      backoffMs: this.backoffMs,
    };
    let lastError: TransportError | undefined;

    while (state.attempt < state.maxAttempts) {
      state.attempt++;
      try {
        const value = await operation(state);
        if (state.attempt > 1) {
          this.logger.info(`Read of ${target} succeeded after ${state.attempt} attempt(s)`);
        }
        return { ok: true, value, attempts: state.attempt };
      } catch (error) {
        if (!(error instanceof TransportError)) {
          throw error;
        }
        lastError = error;
        state.lastError = error.message;
        this.logger.warn(`Attempt ${state.attempt}/${state.maxAttempts} for ${target} failed: ${error.message}`);

        if (state.attempt < state.maxAttempts) {
          await this.sleep(state.backoffMs);
        }
      }
    }

    const exhausted = new ExhaustedRetriesError(
      target,
      state.attempt,
      escalation === 'hard-fail',
      lastError ?? new TransportError('no attempt was made')
    );

    if (exhausted.fatal) {
      this.logger.error(`${exhausted.message}; escalating to process stop`);
      throw exhausted;
    }

    this.logger.warn(`${exhausted.message}; recording device error`);
    return { ok: false, error: exhausted };
  }
}
