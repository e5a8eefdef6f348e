import type { Simetry, SimetryLogger } from "@pitwall/driver-core";
import { ConnectionAbortedError, DriverConnectError, NoSimulatorAvailableError } from "./errors";

export interface ConnectionAttempt {
  id: string;
  /** Must keep retrying until it connects or `signal` aborts. */
  start: (signal: AbortSignal) => Promise<Simetry>;
}

export interface RaceOptions {
  /** Abort to give up on the whole race. */
  signal?: AbortSignal;
  logger: SimetryLogger;
}

interface RaceOutcome {
  winner?: { id: string; session: Simetry };
  failures: DriverConnectError[];
}

/**
 * Starts every attempt at once and resolves with the first session to come
 * up. The moment one wins, the others are aborted; the race only returns once
 * each of them has settled, so no losing transport is left open. A loser that
 * connected anyway is closed.
 *
 * There is no timeout: with nothing to connect to the race waits until
 * `signal` aborts, then rejects with {@link ConnectionAbortedError}. An attempt
 * that rejects on its own is logged and dropped; if all of them drop out the
 * race rejects with {@link NoSimulatorAvailableError}.
 */
export async function raceConnections(attempts: ConnectionAttempt[], options: RaceOptions): Promise<Simetry> {
  const { signal, logger } = options;
  if (signal?.aborted) {
    throw new ConnectionAbortedError();
  }
  if (attempts.length === 0) {
    throw new NoSimulatorAvailableError([]);
  }

  const race = new AbortController();
  const onCallerAbort = () => race.abort(new ConnectionAbortedError());
  signal?.addEventListener("abort", onCallerAbort, { once: true });

  const outcome: RaceOutcome = { failures: [] };
  let remaining = attempts.length;
  let decide = () => {};
  const decided = new Promise<void>((resolve) => {
    decide = resolve;
  });
  race.signal.addEventListener("abort", () => decide(), { once: true });

  const runs = attempts.map((attempt) =>
    Promise.resolve()
      .then(() => attempt.start(race.signal))
      .then(
        async (session) => {
          if (outcome.winner || race.signal.aborted) {
            await closeLoser(attempt.id, session, logger);
            return;
          }
          outcome.winner = { id: attempt.id, session };
          race.abort(new ConnectionAbortedError(`Connected to ${session.name} via ${attempt.id}`));
        },
        (error: unknown) => {
          if (race.signal.aborted) {
            return;
          }
          const failure = new DriverConnectError(attempt.id, error);
          outcome.failures.push(failure);
          logger.error("driver dropped out of the connection race", {
            driver: attempt.id,
            error: failure.message
          });
          remaining -= 1;
          if (remaining === 0) {
            decide();
          }
        }
      )
  );

  try {
    await decided;
    await Promise.allSettled(runs);
  } finally {
    signal?.removeEventListener("abort", onCallerAbort);
  }

  if (outcome.winner) {
    logger.info("connected to simulator", {
      simulator: outcome.winner.session.name,
      driver: outcome.winner.id
    });
    return outcome.winner.session;
  }
  if (signal?.aborted) {
    throw new ConnectionAbortedError();
  }
  throw new NoSimulatorAvailableError(outcome.failures);
}

async function closeLoser(driverId: string, session: Simetry, logger: SimetryLogger): Promise<void> {
  logger.debug("closing session that lost the connection race", { driver: driverId, simulator: session.name });
  try {
    await session.close();
  } catch (error) {
    logger.warn("failed to close losing session", {
      driver: driverId,
      error: error instanceof Error ? error.message : String(error)
    });
  }
}
