import { moments, sleep, snapshotMoment, type Simetry, type SimetryLogger } from "@pitwall/driver-core";
import type { MomentSnapshotJson } from "@pitwall/schemas";

export type MonitorState = "WAITING" | "CONNECTED" | "STOPPED";

export interface MonitorStatus {
  state: MonitorState;
  simulator?: string;
  /** Moments read from the current session. */
  momentsRead: number;
  connectedAt?: string;
}

interface MonitorDependencies {
  /** Races the drivers; must reject once `signal` aborts. */
  connect: (signal: AbortSignal) => Promise<Simetry>;
  logger: SimetryLogger;
  /** Pause before racing again after a failed race. */
  reconnectDelayMs?: number;
  now?: () => Date;
}

/**
 * Keeps one simulator session open, remembers its latest moment and
 * reconnects whenever the session ends.
 */
export class TelemetryMonitor {
  private state: MonitorState = "STOPPED";
  private simulator?: string;
  private connectedAt?: string;
  private momentsRead = 0;
  private latest?: MomentSnapshotJson;
  private controller?: AbortController;
  private loop?: Promise<void>;

  constructor(private readonly deps: MonitorDependencies) {}

  start(): void {
    if (this.loop) return;
    const controller = new AbortController();
    this.controller = controller;
    this.state = "WAITING";
    this.loop = this.run(controller.signal)
      .catch((error: unknown) => {
        this.deps.logger.error("telemetry monitor stopped unexpectedly", {
          error: error instanceof Error ? error.message : String(error)
        });
      })
      .finally(() => {
        this.resetSession();
        this.state = "STOPPED";
      });
  }

  async stop(): Promise<void> {
    this.controller?.abort();
    await this.loop;
    this.loop = undefined;
    this.controller = undefined;
  }

  status(): MonitorStatus {
    return {
      state: this.state,
      ...(this.simulator !== undefined ? { simulator: this.simulator } : {}),
      momentsRead: this.momentsRead,
      ...(this.connectedAt !== undefined ? { connectedAt: this.connectedAt } : {})
    };
  }

  latestSnapshot(): MomentSnapshotJson | undefined {
    return this.latest;
  }

  private async run(signal: AbortSignal): Promise<void> {
    const { logger } = this.deps;

    while (!signal.aborted) {
      this.resetSession();
      this.state = "WAITING";

      let session: Simetry;
      try {
        session = await this.deps.connect(signal);
      } catch (error) {
        if (signal.aborted) break;
        logger.error("simulator race failed", { error: error instanceof Error ? error.message : String(error) });
        if (!(await this.pause(signal))) break;
        continue;
      }

      if (signal.aborted) {
        await session.close();
        break;
      }

      this.state = "CONNECTED";
      this.simulator = session.name;
      this.connectedAt = (this.deps.now?.() ?? new Date()).toISOString();
      try {
        await this.pump(session, signal);
      } catch (error) {
        logger.error("simulator session failed", {
          simulator: session.name,
          error: error instanceof Error ? error.message : String(error)
        });
      }
      logger.info("simulator session ended", { simulator: session.name, momentsRead: this.momentsRead });
    }
  }

  private async pump(session: Simetry, signal: AbortSignal): Promise<void> {
    const onAbort = () => {
      session.close().catch((error: unknown) => {
        this.deps.logger.warn("failed to close session", {
          simulator: session.name,
          error: error instanceof Error ? error.message : String(error)
        });
      });
    };
    signal.addEventListener("abort", onAbort, { once: true });
    try {
      for await (const moment of moments(session)) {
        this.latest = snapshotMoment(moment);
        this.momentsRead += 1;
        if (signal.aborted) break;
      }
    } finally {
      signal.removeEventListener("abort", onAbort);
    }
  }

  /** Resolves false when `signal` aborted during the pause. */
  private pause(signal: AbortSignal): Promise<boolean> {
    return sleep(this.deps.reconnectDelayMs ?? 1000, signal).then(
      () => true,
      () => false
    );
  }

  private resetSession(): void {
    this.simulator = undefined;
    this.connectedAt = undefined;
    this.momentsRead = 0;
    this.latest = undefined;
  }
}
