import { AngularVelocity, Velocity, type BasicTelemetry } from "@pitwall/schemas";
import {
  BaseMoment,
  BaseSimetry,
  retryUntilConnected,
  sleep,
  type DriverConnectOptions,
  type Moment,
  type Simetry,
  type SimetryDriver,
  type SimetryLogger
} from "@pitwall/driver-core";
import { z } from "zod";

export const FAKE_DRIVER_ID = "fake";

export const FakeDriverConfigSchema = z.object({
  name: z.string().min(1).default("Fake Sim"),
  sampleIntervalMs: z.number().int().nonnegative().default(16),
  /** Number of moments before the session ends; unlimited when omitted. */
  ticks: z.number().int().nonnegative().optional(),
  seed: z.number().int().optional(),
  /** Connection attempts that report "not running" before one succeeds. */
  unavailableAttempts: z.number().int().nonnegative().default(0),
  vehicleUniqueId: z.string().min(1).default("fake-gt3")
});

export type FakeDriverConfig = z.infer<typeof FakeDriverConfigSchema>;
export type FakeDriverOptions = z.input<typeof FakeDriverConfigSchema>;

type Rng = () => number;

function createRng(seed: number | undefined): Rng {
  let state = (seed ?? Date.now()) >>> 0;
  if (state === 0) state = 0x1abcdef;
  return () => {
    state = (1664525 * state + 1013904223) >>> 0;
    return state / 0xffffffff;
  };
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

const MAX_RPM = 8000;
const SHIFT_RPM = 7400;
const GEAR_TOP_SPEED_KMH = [0, 70, 110, 150, 190, 230, 270];

export class FakeMoment extends BaseMoment {
  constructor(
    private readonly telemetry: BasicTelemetry,
    private readonly vehicleId: string
  ) {
    super();
  }

  override basicTelemetry(): BasicTelemetry {
    return this.telemetry;
  }

  override shiftPoint(): AngularVelocity {
    return AngularVelocity.fromRevolutionsPerMinute(SHIFT_RPM);
  }

  override vehicleUniqueId(): string {
    return this.vehicleId;
  }
}

/**
 * Synthetic lap: speed climbs with a little noise, gears follow speed and the
 * engine speed follows the gear ratio.
 */
export class FakeSimetry extends BaseSimetry {
  readonly name: string;
  private elapsedMs = 0;
  private emitted = 0;
  private readonly rng: Rng;
  private readonly closed = new AbortController();

  constructor(
    private readonly cfg: FakeDriverConfig,
    logger: SimetryLogger
  ) {
    super(logger);
    this.name = cfg.name;
    this.rng = createRng(cfg.seed);
  }

  protected async readMoment(): Promise<Moment | undefined> {
    if (this.cfg.ticks !== undefined && this.emitted >= this.cfg.ticks) {
      return undefined;
    }
    if (this.emitted > 0 && this.cfg.sampleIntervalMs > 0) {
      try {
        await sleep(this.cfg.sampleIntervalMs, this.closed.signal);
      } catch {
        return undefined;
      }
      this.elapsedMs += this.cfg.sampleIntervalMs;
    }
    this.emitted += 1;
    return new FakeMoment(this.sample(), this.cfg.vehicleUniqueId);
  }

  protected async release(): Promise<void> {
    this.closed.abort();
  }

  private sample(): BasicTelemetry {
    const progress = this.elapsedMs / 60_000;
    const noise = (this.rng() - 0.5) * 2;
    const speedKmh = clamp(260 * Math.atan(progress * 4) * (2 / Math.PI) + noise * 3, 0, 270);
    const gearIndex = GEAR_TOP_SPEED_KMH.findIndex((top) => speedKmh <= top);
    const gear = gearIndex === -1 ? GEAR_TOP_SPEED_KMH.length - 1 : Math.max(1, gearIndex);
    const lower = GEAR_TOP_SPEED_KMH[gear - 1];
    const upper = GEAR_TOP_SPEED_KMH[gear];
    const rpm = clamp(3000 + ((speedKmh - lower) / (upper - lower)) * (MAX_RPM - 3000), 900, MAX_RPM);

    return {
      gear,
      speed: Velocity.fromKilometersPerHour(Number(speedKmh.toFixed(2))),
      engineRotationSpeed: AngularVelocity.fromRevolutionsPerMinute(Math.round(rpm)),
      maxEngineRotationSpeed: AngularVelocity.fromRevolutionsPerMinute(MAX_RPM),
      pitLimiterEngaged: false,
      inPitLane: false
    };
  }
}

export class FakeDriver implements SimetryDriver {
  readonly id = FAKE_DRIVER_ID;
  private readonly cfg: FakeDriverConfig;
  private attempts = 0;

  constructor(options: FakeDriverOptions = {}) {
    this.cfg = FakeDriverConfigSchema.parse(options);
  }

  async connect(options: DriverConnectOptions): Promise<Simetry> {
    const { retryDelayMs, signal, logger } = options;
    return retryUntilConnected(
      async () => {
        this.attempts += 1;
        return this.attempts > this.cfg.unavailableAttempts ? new FakeSimetry(this.cfg, logger) : undefined;
      },
      { label: this.cfg.name, retryDelayMs, signal, logger }
    );
  }
}
