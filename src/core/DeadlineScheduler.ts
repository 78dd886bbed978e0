import { ConstructionError, VaultError, ErrorType } from '../errors/ErrorHandler';
import { Logger } from '../monitoring/observability/logger';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface DeadlineSchedulerOptions {
  blockIntervalMs?: number;
  safetyMarginMs?: number;
  sleep?: Sleep;
}

export class WaitAbortedError extends VaultError {
  constructor(deadline: number) {
    super(`Wait for deadline ${deadline} was aborted`, ErrorType.TIMEOUT_ERROR, { deadline }, null, false);
    this.name = 'WaitAbortedError';
  }
}

export const sleep: Sleep = (ms, signal) => new Promise<void>((resolve, reject) => {
  if (signal?.aborted) {
    reject(new Error('aborted'));
    return;
  }
  const onAbort = (): void => {
    clearTimeout(timer);
    reject(new Error('aborted'));
  };
  const timer = setTimeout(() => {
    signal?.removeEventListener('abort', onAbort);
    resolve();
  }, ms);
  signal?.addEventListener('abort', onAbort, { once: true });
});

/**
 * Converts a block deadline into wall-clock time. The estimate is only a
 * pacing aid: the ledger's script check at consumption time is authoritative.
 */
export class DeadlineScheduler {
  readonly blockIntervalMs: number;
  readonly safetyMarginMs: number;
  private readonly sleep: Sleep;
  private readonly logger = Logger.getInstance().child({ component: 'deadline-scheduler' });

  constructor(options: DeadlineSchedulerOptions = {}) {
    this.blockIntervalMs = options.blockIntervalMs ?? 3000;
    this.safetyMarginMs = options.safetyMarginMs ?? 1000;
    this.sleep = options.sleep ?? sleep;
    for (const [field, value] of [['blockIntervalMs', this.blockIntervalMs], ['safetyMarginMs', this.safetyMarginMs]] as const) {
      if (!Number.isFinite(value) || value < 0) {
        throw new ConstructionError(`${field} must be a non-negative number, got ${value}`, { field, value });
      }
    }
  }

  estimateDelay(deadline: number, observedHeight: number): number {
    return Math.max(0, deadline - observedHeight) * this.blockIntervalMs + this.safetyMarginMs;
  }

  /**
   * Sleeps until the deadline is expected to have been reached
   * @returns the delay waited, in milliseconds
   * @throws WaitAbortedError if `signal` fires first
   */
  async waitForDeadline(deadline: number, observedHeight: number, signal?: AbortSignal): Promise<number> {
    const delay = this.estimateDelay(deadline, observedHeight);
    this.logger.info('Waiting for deadline', { deadline, observedHeight, delay });
    try {
      await this.sleep(delay, signal);
    } catch (error) {
      if (signal?.aborted) {
        throw new WaitAbortedError(deadline);
      }
      throw error;
    }
    return delay;
  }
}
