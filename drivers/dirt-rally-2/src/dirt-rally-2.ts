import dgram from "node:dgram";
import { AngularVelocity, Velocity, type BasicTelemetry } from "@pitwall/schemas";
import {
  BaseMoment,
  BaseSimetry,
  retryUntilConnected,
  type DriverConnectOptions,
  type Moment,
  type Simetry,
  type SimetryDriver,
  type SimetryLogger
} from "@pitwall/driver-core";
import {
  DirtRally2DriverConfigSchema,
  parseHostPort,
  type DirtRally2DriverConfig,
  type DirtRally2DriverOptions
} from "./config";
import { decodePacket, type DirtRally2Packet } from "./packet";

export const DIRT_RALLY_2_DRIVER_ID = "dirt-rally-2";

export class DirtRally2Moment extends BaseMoment {
  constructor(readonly packet: DirtRally2Packet) {
    super();
  }

  override basicTelemetry(): BasicTelemetry {
    return {
      gear: this.packet.gear,
      speed: Velocity.fromMetersPerSecond(this.packet.speed),
      engineRotationSpeed: AngularVelocity.fromRevolutionsPerMinute(this.packet.rpm),
      maxEngineRotationSpeed: AngularVelocity.fromRevolutionsPerMinute(this.packet.maxRpm),
      pitLimiterEngaged: false,
      inPitLane: false
    };
  }
}

export class DirtRally2Simetry extends BaseSimetry {
  readonly name = "DiRT Rally 2.0";

  private readonly queue: DirtRally2Packet[] = [];
  private waiter: ((packet: DirtRally2Packet | undefined) => void) | null = null;
  private pendingRead: Promise<Moment | undefined> | null = null;
  private failed = false;

  constructor(
    private readonly socket: dgram.Socket,
    first: DirtRally2Packet,
    private readonly cfg: DirtRally2DriverConfig,
    logger: SimetryLogger
  ) {
    super(logger);
    this.queue.push(first);
    socket.on("message", this.onMessage);
    socket.on("error", this.onError);
  }

  protected readMoment(): Promise<Moment | undefined> {
    const next = this.queue.shift();
    if (next) {
      return Promise.resolve(new DirtRally2Moment(next));
    }
    if (this.failed) {
      return Promise.resolve(undefined);
    }
    // Concurrent readers share the one pending wait.
    this.pendingRead ??= new Promise<Moment | undefined>((resolve) => {
      const settle = (moment: Moment | undefined) => {
        clearTimeout(timer);
        this.waiter = null;
        this.pendingRead = null;
        resolve(moment);
      };
      const timer = setTimeout(() => {
        this.logger.info(`${this.name}: no telemetry for ${this.cfg.dataTimeoutMs}ms`);
        settle(undefined);
      }, this.cfg.dataTimeoutMs);

      this.waiter = (packet) => settle(packet ? new DirtRally2Moment(packet) : undefined);
    });
    return this.pendingRead;
  }

  protected async release(): Promise<void> {
    this.socket.off("message", this.onMessage);
    this.waiter?.(undefined);
    await new Promise<void>((resolve) => {
      this.socket.close(() => resolve());
    });
  }

  private readonly onMessage = (msg: Buffer) => {
    const packet = decodePacket(msg);
    if (!packet) return;
    if (this.waiter) {
      this.waiter(packet);
      return;
    }
    this.queue.push(packet);
    if (this.queue.length > this.cfg.maxQueuedPackets) {
      this.queue.shift();
    }
  };

  private readonly onError = (error: Error) => {
    this.logger.warn(`${this.name}: socket error`, { error: error.message });
    this.failed = true;
    this.waiter?.(undefined);
  };
}

interface FirstPacket {
  socket: dgram.Socket;
  packet: DirtRally2Packet;
}

/** Binds `host:port` and resolves on the first valid packet. Aborting closes the socket. */
function listenForFirstPacket(host: string, port: number, signal: AbortSignal): Promise<FirstPacket> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }

    const socket = dgram.createSocket({ type: "udp4", reuseAddr: true });

    const detach = () => {
      socket.off("message", onMessage);
      socket.off("error", onError);
      signal.removeEventListener("abort", onAbort);
    };
    const fail = (reason: unknown) => {
      detach();
      socket.close();
      reject(reason);
    };
    const onMessage = (msg: Buffer) => {
      const packet = decodePacket(msg);
      if (!packet) return;
      detach();
      resolve({ socket, packet });
    };
    const onError = (error: Error) => fail(error);
    const onAbort = () => fail(signal.reason);

    socket.on("message", onMessage);
    socket.on("error", onError);
    signal.addEventListener("abort", onAbort, { once: true });
    socket.bind(port, host);
  });
}

/**
 * DiRT Rally 2.0 with UDP telemetry enabled (`extradata="3"` in the game's
 * hardware_settings_config.xml). The game only sends while driving, so the
 * first packet marks the connection.
 */
export class DirtRally2Driver implements SimetryDriver {
  readonly id = DIRT_RALLY_2_DRIVER_ID;

  constructor(private readonly defaults: DirtRally2DriverOptions = {}) {}

  async connect(options: DriverConnectOptions): Promise<Simetry> {
    const { retryDelayMs, signal, logger } = options;
    const config = DirtRally2DriverConfigSchema.parse({
      ...this.defaults,
      uri: options.uri ?? this.defaults.uri
    });
    const { host, port } = parseHostPort(config.uri);

    const { socket, packet } = await retryUntilConnected(
      (attemptSignal) => listenForFirstPacket(host, port, attemptSignal),
      { label: `dirt-rally-2 ${config.uri}`, retryDelayMs, signal, logger }
    );

    logger.info("dirt-rally-2: receiving telemetry", { uri: config.uri });
    return new DirtRally2Simetry(socket, packet, config, logger);
  }
}
