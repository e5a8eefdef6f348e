import type { FastifyInstance } from "fastify";
import type { TelemetryMonitor } from "../core/monitor";

interface StatusDeps {
  monitor: TelemetryMonitor;
}

export function registerStatusRoute(app: FastifyInstance, deps: StatusDeps): void {
  const { monitor } = deps;

  app.get("/status", () => monitor.status());
}
