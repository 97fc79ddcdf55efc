/**
 * slash-registry — src/lib/timeout.ts
 * WHAT: Races a promise against a deadline.
 * USAGE:
 *  await withTimeout(syncGuild(id), 10_000, () => new GuildSyncTimeoutError(id, 10_000));
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { logger } from "./logger.js";

/**
 * Rejects with onTimeout() once ms elapse. The losing promise keeps running unless
 * onTimeout cancels it; a late rejection from it is logged so it never surfaces as unhandled.
 * Work that rejects with the timeout error itself (an aborted signal's reason) is not logged.
 */
export function withTimeout<T>(
  work: Promise<T>,
  ms: number,
  onTimeout: () => Error,
  label = "operation"
): Promise<T> {
  let timeoutError: Error | undefined;
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      timeoutError = onTimeout();
      reject(timeoutError);
    }, ms);
    // A pending deadline must not keep the process alive
    timer.unref();
  });

  void work.catch((err: unknown) => {
    if (timeoutError !== undefined && err !== timeoutError) {
      logger.warn({ evt: "late_rejection", label, err }, `[timeout] ${label} failed after its deadline`);
    }
  });

  return Promise.race([work, deadline]).finally(() => clearTimeout(timer));
}
