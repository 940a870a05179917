/**
 * Periodic sweep that returns expired free trials to inactive.
 */

import { getErrorMessage } from '@creditledger/core';
import type { SubscriptionService } from '../billing/subscription-service.js';
import { createLogger } from './logger.js';

const log = createLogger('TrialExpiryJob');

export interface TrialExpiryJobOptions {
  intervalMs: number;
  /** Clock override for tests */
  now?: () => Date;
}

export class TrialExpiryJob {
  private timer: ReturnType<typeof setInterval> | null = null;
  private readonly now: () => Date;

  constructor(
    private subscriptions: SubscriptionService,
    private options: TrialExpiryJobOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  start(): void {
    if (this.timer) return;
    log.info(`Starting trial expiry sweep (interval: ${this.options.intervalMs}ms)`);
    this.timer = setInterval(() => {
      this.runOnce().catch((err) => {
        log.error('Trial expiry sweep failed', { error: getErrorMessage(err) });
      });
    }, this.options.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      log.info('Stopped');
    }
  }

  /** One sweep; returns the number of trials expired */
  async runOnce(): Promise<number> {
    return this.subscriptions.expireTrials(this.now());
  }
}
