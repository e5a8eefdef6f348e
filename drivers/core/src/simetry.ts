import type { Moment, Simetry, SimetryLogger } from "./types";

/**
 * Shared lifecycle for driver sessions.
 *
 * Subclasses implement `readMoment` and `release`. Once `readMoment` yields
 * `undefined` (or throws) the session is finished: the transport is released
 * and every later `nextMoment` resolves `undefined` without touching it.
 */
export abstract class BaseSimetry implements Simetry {
  abstract readonly name: string;

  private finished = false;
  private releasing: Promise<void> | null = null;

  protected constructor(protected readonly logger: SimetryLogger) {}

  get ended(): boolean {
    return this.finished;
  }

  async nextMoment(): Promise<Moment | undefined> {
    if (this.finished) {
      return undefined;
    }

    let moment: Moment | undefined;
    try {
      moment = await this.readMoment();
    } catch (error) {
      this.logger.warn(`${this.name}: reading telemetry failed, ending session`, {
        error: error instanceof Error ? error.message : String(error)
      });
      moment = undefined;
    }

    if (moment === undefined || this.finished) {
      await this.close();
      return undefined;
    }
    return moment;
  }

  close(): Promise<void> {
    this.finished = true;
    if (!this.releasing) {
      this.logger.debug(`${this.name}: releasing connection`);
      this.releasing = this.release();
    }
    return this.releasing;
  }

  /** Waits for the next reading. `undefined` ends the session. */
  protected abstract readMoment(): Promise<Moment | undefined>;

  /** Closes the transport. Any pending `readMoment` must settle afterwards. */
  protected abstract release(): Promise<void>;
}
