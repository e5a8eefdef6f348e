import {
  AngularVelocity,
  basicTelemetryFromJson,
  type BasicTelemetry,
  type RacingFlags
} from "@pitwall/schemas";
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
  GenericHttpDriverConfigSchema,
  type GenericHttpDriverConfig,
  type GenericHttpDriverOptions
} from "./config";
import { GenericHttpPayloadSchema, type GenericHttpPayload } from "./payload";

export const GENERIC_HTTP_DRIVER_ID = "generic-http";

export class GenericHttpMoment extends BaseMoment {
  constructor(private readonly payload: GenericHttpPayload) {
    super();
  }

  override vehicleLeft(): boolean {
    return this.payload.vehicleLeft;
  }

  override vehicleRight(): boolean {
    return this.payload.vehicleRight;
  }

  override basicTelemetry(): BasicTelemetry | undefined {
    const json = this.payload.basicTelemetry;
    return json ? basicTelemetryFromJson(json) : undefined;
  }

  override shiftPoint(): AngularVelocity | undefined {
    const value = this.payload.shiftPoint;
    return value === undefined ? undefined : AngularVelocity.fromRadiansPerSecond(value);
  }

  override flags(): RacingFlags {
    return { ...this.payload.flags };
  }

  override vehicleUniqueId(): string | undefined {
    return this.payload.vehicleUniqueId;
  }

  override ignitionOn(): boolean {
    return this.payload.ignitionOn;
  }

  override starterOn(): boolean {
    return this.payload.starterOn;
  }
}

export class GenericHttpSimetry extends HttpPollingSimetry<GenericHttpPayload> {
  readonly name: string;

  constructor(config: GenericHttpDriverConfig, initial: GenericHttpPayload, logger: SimetryLogger) {
    super({ ...config, logger }, GenericHttpPayloadSchema, initial);
    this.name = initial.name;
  }

  protected toMoment(payload: GenericHttpPayload): Moment {
    return new GenericHttpMoment(payload);
  }
}

/**
 * Connects to any sim (or plugin) that serves its state as JSON over HTTP in
 * the {@link GenericHttpPayloadSchema} shape.
 */
export class GenericHttpDriver implements SimetryDriver {
  readonly id = GENERIC_HTTP_DRIVER_ID;

  constructor(private readonly defaults: GenericHttpDriverOptions = {}) {}

  async connect(options: DriverConnectOptions): Promise<Simetry> {
    const { retryDelayMs, signal, logger } = options;
    const config = GenericHttpDriverConfigSchema.parse({
      ...this.defaults,
      uri: options.uri ?? this.defaults.uri
    });

    const initial = await retryUntilConnected(
      (attemptSignal) =>
        fetchJson(config.uri, GenericHttpPayloadSchema, {
          signal: attemptSignal,
          timeoutMs: config.requestTimeoutMs
        }),
      { label: `generic-http ${config.uri}`, retryDelayMs, signal, logger }
    );

    logger.info("generic-http: connected", { uri: config.uri, name: initial.name });
    return new GenericHttpSimetry(config, initial, logger);
  }
}
