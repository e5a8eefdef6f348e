import { sleep } from "./signals";
import type { SimetryLogger } from "./types";

export interface RetryOptions {
  /** Name used in log lines. */
  label: string;
  retryDelayMs: number;
  signal: AbortSignal;
  logger: SimetryLogger;
}

/**
 * Calls `attempt` until it yields a value, waiting `retryDelayMs` after every
 * miss or failure so there is at most one attempt per interval.
 *
 * `attempt` resolves `undefined` when the sim is simply not there yet and
 * throws on transport errors; both are retried. Only an abort of `signal`
 * ends the loop, by rejecting with the signal's reason.
 */
export async function retryUntilConnected<T>(
  attempt: (signal: AbortSignal) => Promise<T | undefined>,
  options: RetryOptions
): Promise<T> {
  const { label, retryDelayMs, signal, logger } = options;

  for (let attemptNumber = 1; ; attemptNumber += 1) {
    signal.throwIfAborted();
    try {
      const result = await attempt(signal);
      if (result !== undefined) {
        logger.debug(`${label}: connected`, { attempt: attemptNumber });
        return result;
      }
      logger.debug(`${label}: not available yet`, { attempt: attemptNumber });
    } catch (error) {
      signal.throwIfAborted();
      logger.debug(`${label}: connection attempt failed`, {
        attempt: attemptNumber,
        error: error instanceof Error ? error.message : String(error)
      });
    }
    await sleep(retryDelayMs, signal);
  }
}
