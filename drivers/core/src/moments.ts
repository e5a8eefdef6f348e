import type { Moment, Simetry } from "./types";

/**
 * Iterates a session's moments until the connection ends.
 *
 * ```typescript
 * for await (const moment of moments(await connect())) {
 *   console.log(moment.basicTelemetry()?.gear);
 * }
 * ```
 *
 * The session is closed when the loop finishes, including on `break` or a
 * thrown error.
 */
export async function* moments(session: Simetry): AsyncGenerator<Moment, void, undefined> {
  try {
    for (;;) {
      const moment = await session.nextMoment();
      if (moment === undefined) {
        return;
      }
      yield moment;
    }
  } finally {
    await session.close();
  }
}
