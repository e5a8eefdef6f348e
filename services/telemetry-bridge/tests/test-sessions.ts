import { AngularVelocity, Velocity, type BasicTelemetry } from "@pitwall/schemas";
import { BaseMoment, BaseSimetry, noopLogger, type Moment, type Simetry } from "@pitwall/driver-core";

export class BenchMoment extends BaseMoment {
  constructor(readonly label: string) {
    super();
  }

  override basicTelemetry(): BasicTelemetry {
    return {
      gear: 3,
      speed: Velocity.fromMetersPerSecond(45),
      engineRotationSpeed: AngularVelocity.fromRadiansPerSecond(600),
      maxEngineRotationSpeed: AngularVelocity.fromRadiansPerSecond(800),
      pitLimiterEngaged: false,
      inPitLane: false
    };
  }

  override vehicleUniqueId(): string {
    return this.label;
  }
}

/** Replays its moments, then either ends or stays open until closed. */
export class BenchSession extends BaseSimetry {
  releaseCount = 0;
  private readonly queue: Moment[];
  private readonly released = new AbortController();

  constructor(
    readonly name: string,
    moments: Moment[],
    private readonly holdOpen: boolean
  ) {
    super(noopLogger);
    this.queue = [...moments];
  }

  protected async readMoment(): Promise<Moment | undefined> {
    const next = this.queue.shift();
    if (next || !this.holdOpen) {
      return next;
    }
    const { signal } = this.released;
    await new Promise<void>((resolve) => {
      if (signal.aborted) {
        resolve();
        return;
      }
      signal.addEventListener("abort", () => resolve(), { once: true });
    });
    return undefined;
  }

  protected async release(): Promise<void> {
    this.releaseCount += 1;
    this.released.abort();
  }
}

/**
 * Stand-in for a connection race: hands out the given outcomes in order,
 * then waits for the abort like a race with nothing to connect to.
 */
export function scriptedConnect(outcomes: Array<Simetry | Error>) {
  const queue = [...outcomes];
  const script = {
    calls: 0,
    settledAfterAbort: false,
    connect: (signal: AbortSignal): Promise<Simetry> => {
      script.calls += 1;
      const next = queue.shift();
      if (next instanceof Error) {
        return Promise.reject(next);
      }
      if (next) {
        return Promise.resolve(next);
      }
      return new Promise<Simetry>((_resolve, reject) => {
        signal.addEventListener(
          "abort",
          () => {
            script.settledAfterAbort = true;
            reject(signal.reason);
          },
          { once: true }
        );
      });
    }
  };
  return script;
}
