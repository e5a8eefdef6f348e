import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import type { TelemetryMonitor } from "../core/monitor";

interface TelemetryDeps {
  monitor: TelemetryMonitor;
}

export function registerTelemetryRoute(app: FastifyInstance, deps: TelemetryDeps): void {
  const { monitor } = deps;

  app.get("/telemetry", async (_request: FastifyRequest, reply: FastifyReply) => {
    const snapshot = monitor.latestSnapshot();
    if (!snapshot) {
      return reply.status(404).send({ error: "No telemetry available" });
    }
    return snapshot;
  });
}
