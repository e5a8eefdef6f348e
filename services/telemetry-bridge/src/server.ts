import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import type { SimetryDriver } from "@pitwall/driver-core";
import {
  SimetryConnectionBuilder,
  createPinoLogger,
  loadConnectionConfigFromEnv,
  type SimetryConnectionConfigInput
} from "@pitwall/simetry";
import { TelemetryMonitor } from "./core/monitor";
import { registerHealthRoutes } from "./routes/health";
import { registerStatusRoute } from "./routes/status";
import { registerTelemetryRoute } from "./routes/telemetry";

export interface BuildServerOptions {
  logger?: FastifyServerOptions["logger"];
  /** Defaults to `PITWALL_*` environment settings. */
  connectionConfig?: SimetryConnectionConfigInput;
  drivers?: SimetryDriver[];
  monitor?: TelemetryMonitor;
}

export async function buildServer(options: BuildServerOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({ logger: options.logger ?? true });
  const logger = createPinoLogger(app.log);

  const monitor =
    options.monitor ??
    (() => {
      const builder = new SimetryConnectionBuilder(options.connectionConfig ?? loadConnectionConfigFromEnv(), {
        drivers: options.drivers,
        logger
      });
      return new TelemetryMonitor({
        connect: (signal) => builder.connect(signal),
        logger,
        reconnectDelayMs: builder.config.retryDelayMs
      });
    })();

  registerHealthRoutes(app);
  registerStatusRoute(app, { monitor });
  registerTelemetryRoute(app, { monitor });

  app.addHook("onReady", async () => {
    monitor.start();
  });

  app.addHook("onClose", async () => {
    await monitor.stop();
  });

  return app;
}

export { TelemetryMonitor } from "./core/monitor";
export type { MonitorState, MonitorStatus } from "./core/monitor";
