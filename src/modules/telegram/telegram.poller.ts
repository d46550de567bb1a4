/**
 * TELEGRAM POLLER
 *
 * Long-poll loop over getUpdates. Each update is handed to `onUpdate` without
 * waiting for it, so a slow pipeline never holds up the next batch. In-flight
 * handlers are tracked so stop() can drain them.
 */

import { errorMessage } from '../../common/errors.js';
import type { Logger } from '../../common/logger.js';
import type { TelegramUpdate, UpdateSource } from './telegram.types.js';

export interface TelegramPollerConfig {
  source: UpdateSource;
  onUpdate: (update: TelegramUpdate) => Promise<void>;
  logger: Logger;
  timeoutSec: number;
  errorBackoffMs: number;
}

export class TelegramPoller {
  private readonly config: TelegramPollerConfig;
  private readonly inFlight = new Set<Promise<void>>();
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private offset: number | undefined;
  private stopped = false;

  constructor(config: TelegramPollerConfig) {
    this.config = config;
  }

  get isRunning(): boolean {
    return this.loop !== null && !this.stopped;
  }

  /**
   * Start polling. Resolves when the loop exits after stop().
   */
  run(): Promise<void> {
    if (!this.loop) {
      this.stopped = false;
      this.controller = new AbortController();
      this.loop = this.poll(this.controller.signal);
    }
    return this.loop;
  }

  async stop(): Promise<void> {
    this.stopped = true;
    this.controller?.abort();
    await this.loop;
    await Promise.allSettled([...this.inFlight]);
    this.loop = null;
  }

  private async poll(signal: AbortSignal): Promise<void> {
    const { source, logger, timeoutSec, errorBackoffMs } = this.config;
    logger.info({ timeoutSec }, 'Polling for updates');

    while (!this.stopped) {
      let updates: TelegramUpdate[];
      try {
        updates = await source.getUpdates({ offset: this.offset, timeoutSec, signal });
      } catch (err) {
        if (this.stopped) break;
        logger.error({ error: errorMessage(err), backoffMs: errorBackoffMs }, 'getUpdates failed');
        await abortableSleep(errorBackoffMs, signal);
        continue;
      }

      for (const update of updates) {
        this.offset = Math.max(this.offset ?? 0, update.update_id + 1);
        this.dispatch(update);
      }
    }

    logger.info({ offset: this.offset }, 'Polling stopped');
  }

  private dispatch(update: TelegramUpdate): void {
    const task = this.config
      .onUpdate(update)
      .catch(err => {
        this.config.logger.error({ updateId: update.update_id, error: errorMessage(err) }, 'Update handler failed');
      })
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }
}

function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal.aborted) return resolve();
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    }
    signal.addEventListener('abort', done, { once: true });
  });
}
