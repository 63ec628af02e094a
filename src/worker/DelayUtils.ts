/**
 * Delay helpers for the long-running roles
 */

import { createChildLogger, formatDuration, serializeError } from '../logging/index.js';

const delayLogger = createChildLogger('DELAY');

export class DelayUtils {
  /**
   * Sleep for `ms`, resolving early when `signal` aborts
   */
  static async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return;
    return new Promise((resolve) => {
      const onAbort = () => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Milliseconds from `now` to the next wall-clock minute boundary
   */
  static msUntilNextMinute(now: Date): number {
    return 60000 - (now.getTime() % 60000);
  }

  /**
   * Handle critical error delay
   */
  static async handleCriticalErrorDelay(error: unknown, cooldownMs: number, signal?: AbortSignal): Promise<void> {
    delayLogger.error(
      { error: serializeError(error), delayMs: cooldownMs },
      `Critical error in main loop. Waiting ${formatDuration(cooldownMs)} before retrying.`
    );
    await this.sleep(cooldownMs, signal);
  }
}
