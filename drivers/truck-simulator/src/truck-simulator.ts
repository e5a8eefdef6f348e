import { AngularVelocity, Velocity, type BasicTelemetry } from "@pitwall/schemas";
import {
  BaseMoment,
  HttpPollingSimetry,
  fetchJson,
  retryUntilConnected,
  type DriverConnectOptions,
  type Moment,
  type Simetry,
  type SimetryDriver,
  type SimetryLogger
} from "@pitwall/driver-core";
import {
  TruckSimulatorDriverConfigSchema,
  type TruckSimulatorDriverConfig,
  type TruckSimulatorDriverOptions
} from "./config";
import { TruckTelemetrySchema, truckSimulatorName, type TruckTelemetry } from "./telemetry";

export const TRUCK_SIMULATOR_DRIVER_ID = "truck-simulator";

export class TruckSimulatorMoment extends BaseMoment {
  constructor(private readonly telemetry: TruckTelemetry) {
    super();
  }

  override basicTelemetry(): BasicTelemetry {
    const { truck } = this.telemetry;
    return {
      gear: truck.displayedGear,
      speed: Velocity.fromKilometersPerHour(truck.speed),
      engineRotationSpeed: AngularVelocity.fromRevolutionsPerMinute(truck.engineRpm),
      maxEngineRotationSpeed: AngularVelocity.fromRevolutionsPerMinute(truck.engineRpmMax),
      pitLimiterEngaged: false,
      inPitLane: false
    };
  }

  override vehicleUniqueId(): string | undefined {
    return this.telemetry.truck.id || undefined;
  }

  override ignitionOn(): boolean {
    return this.telemetry.truck.electricOn;
  }
}

export class TruckSimulatorSimetry extends HttpPollingSimetry<TruckTelemetry> {
  readonly name: string;

  constructor(config: TruckSimulatorDriverConfig, initial: TruckTelemetry, logger: SimetryLogger) {
    super({ ...config, logger }, TruckTelemetrySchema, initial);
    this.name = truckSimulatorName(initial.game.gameName);
  }

  protected toMoment(payload: TruckTelemetry): Moment | undefined {
    if (!payload.game.connected) {
      this.logger.info(`${this.name}: game disconnected from telemetry server`);
      return undefined;
    }
    return new TruckSimulatorMoment(payload);
  }
}

/**
 * Euro Truck Simulator 2 and American Truck Simulator, through the community
 * telemetry server. The server can run without the game, so a response only
 * counts as connected when it reports `game.connected`.
 */
export class TruckSimulatorDriver implements SimetryDriver {
  readonly id = TRUCK_SIMULATOR_DRIVER_ID;

  constructor(private readonly defaults: TruckSimulatorDriverOptions = {}) {}

  async connect(options: DriverConnectOptions): Promise<Simetry> {
    const { retryDelayMs, signal, logger } = options;
    const config = TruckSimulatorDriverConfigSchema.parse({
      ...this.defaults,
      uri: options.uri ?? this.defaults.uri
    });

    const initial = await retryUntilConnected(
      async (attemptSignal) => {
        const telemetry = await fetchJson(config.uri, TruckTelemetrySchema, {
          signal: attemptSignal,
          timeoutMs: config.requestTimeoutMs
        });
        return telemetry.game.connected ? telemetry : undefined;
      },
      { label: `truck-simulator ${config.uri}`, retryDelayMs, signal, logger }
    );

    logger.info("truck-simulator: connected", { uri: config.uri, game: initial.game.gameName });
    return new TruckSimulatorSimetry(config, initial, logger);
  }
}
