import { afterEach, describe, expect, it, vi } from "vitest";
import type { FastifyInstance } from "fastify";
import { noopLogger } from "@pitwall/driver-core";
import { FakeDriver } from "@pitwall/driver-fake";
import { buildServer } from "../src/server";
import { TelemetryMonitor } from "../src/core/monitor";
import { BenchMoment, BenchSession, scriptedConnect } from "./test-sessions";

describe("telemetry-bridge routes", () => {
  let server: FastifyInstance | undefined;

  afterEach(async () => {
    await server?.close();
    server = undefined;
  });

  it("reports health", async () => {
    server = await buildServer({
      logger: false,
      monitor: new TelemetryMonitor({ connect: scriptedConnect([]).connect, logger: noopLogger })
    });

    const res = await server.inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: "ok" });
  });

  it("answers 404 until a moment has been read", async () => {
    server = await buildServer({
      logger: false,
      monitor: new TelemetryMonitor({ connect: scriptedConnect([]).connect, logger: noopLogger })
    });

    const status = await server.inject({ method: "GET", url: "/status" });
    expect(status.json()).toEqual({ state: "WAITING", momentsRead: 0 });

    const telemetry = await server.inject({ method: "GET", url: "/telemetry" });
    expect(telemetry.statusCode).toBe(404);
    expect(telemetry.json()).toEqual({ error: "No telemetry available" });
  });

  it("serves the latest snapshot of the live session", async () => {
    const session = new BenchSession("Bench Sim", [new BenchMoment("car-7")], true);
    const monitor = new TelemetryMonitor({
      connect: scriptedConnect([session]).connect,
      logger: noopLogger,
      now: () => new Date("2024-05-01T12:00:00.000Z")
    });
    server = await buildServer({ logger: false, monitor });
    await server.ready();
    await vi.waitFor(() => expect(monitor.status().momentsRead).toBe(1));

    const status = await server.inject({ method: "GET", url: "/status" });
    expect(status.json()).toEqual({
      state: "CONNECTED",
      simulator: "Bench Sim",
      momentsRead: 1,
      connectedAt: "2024-05-01T12:00:00.000Z"
    });

    const telemetry = await server.inject({ method: "GET", url: "/telemetry" });
    expect(telemetry.statusCode).toBe(200);
    expect(telemetry.json()).toEqual({
      vehicleLeft: false,
      vehicleRight: false,
      basicTelemetry: {
        gear: 3,
        speed: 45,
        engineRotationSpeed: 600,
        maxEngineRotationSpeed: 800,
        pitLimiterEngaged: false,
        inPitLane: false
      },
      flags: {
        green: false,
        yellow: false,
        caution: false,
        blue: false,
        white: false,
        black: false,
        meatball: false,
        red: false,
        checkered: false
      },
      vehicleUniqueId: "car-7",
      ignitionOn: true,
      starterOn: false
    });
  });

  it("releases the session when the server closes", async () => {
    const session = new BenchSession("Bench Sim", [], true);
    const monitor = new TelemetryMonitor({ connect: scriptedConnect([session]).connect, logger: noopLogger });
    const app = await buildServer({ logger: false, monitor });
    await app.ready();
    await vi.waitFor(() => expect(monitor.status().state).toBe("CONNECTED"));

    await app.close();

    expect(session.releaseCount).toBe(1);
    expect(monitor.status().state).toBe("STOPPED");
  });

  it("races the configured drivers by default", async () => {
    server = await buildServer({
      logger: false,
      connectionConfig: { retryDelayMs: 10 },
      drivers: [new FakeDriver({ sampleIntervalMs: 5, seed: 3 })]
    });
    await server.ready();

    await vi.waitFor(async () => {
      const res = await server?.inject({ method: "GET", url: "/status" });
      expect(res?.json()).toMatchObject({ state: "CONNECTED", simulator: "Fake Sim" });
      expect(res?.json<{ momentsRead: number }>().momentsRead).toBeGreaterThan(0);
    });

    const telemetry = await server.inject({ method: "GET", url: "/telemetry" });
    expect(telemetry.statusCode).toBe(200);
    expect(telemetry.json()).toMatchObject({ vehicleUniqueId: "fake-gt3", shiftPoint: expect.any(Number) });
  });
});
