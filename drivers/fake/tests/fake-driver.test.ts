import { describe, expect, it } from "vitest";
import { noopLogger, type DriverConnectOptions } from "@pitwall/driver-core";
import { FakeDriver } from "../src/fake-driver";

function connectOptions(overrides: Partial<DriverConnectOptions> = {}): DriverConnectOptions {
  return {
    retryDelayMs: 5,
    signal: new AbortController().signal,
    logger: noopLogger,
    ...overrides
  };
}

describe("FakeDriver", () => {
  it("produces deterministic telemetry with fixed seed", async () => {
    const options = { seed: 42, sampleIntervalMs: 0 };
    const sessionA = await new FakeDriver(options).connect(connectOptions());
    const sessionB = await new FakeDriver(options).connect(connectOptions());

    for (let i = 0; i < 3; i += 1) {
      const a = (await sessionA.nextMoment())?.basicTelemetry();
      const b = (await sessionB.nextMoment())?.basicTelemetry();
      expect(a).toBeDefined();
      expect(a).toEqual(b);
    }

    await sessionA.close();
    await sessionB.close();
  });

  it("ends after the configured number of ticks", async () => {
    const session = await new FakeDriver({ ticks: 2, sampleIntervalMs: 0, seed: 1 }).connect(connectOptions());
    expect(await session.nextMoment()).toBeDefined();
    expect(await session.nextMoment()).toBeDefined();
    expect(await session.nextMoment()).toBeUndefined();
    expect(await session.nextMoment()).toBeUndefined();
  });

  it("stays within plausible bounds", async () => {
    const session = await new FakeDriver({ seed: 7, sampleIntervalMs: 0 }).connect(connectOptions());
    const moment = await session.nextMoment();
    const telemetry = moment?.basicTelemetry();
    expect(telemetry?.gear).toBeGreaterThanOrEqual(1);
    expect(telemetry?.gear).toBeLessThanOrEqual(6);
    expect(telemetry?.engineRotationSpeed.revolutionsPerMinute).toBeLessThanOrEqual(8000);
    expect(moment?.shiftPoint()?.revolutionsPerMinute).toBeCloseTo(7400, 6);
    expect(moment?.vehicleUniqueId()).toBe("fake-gt3");
    expect(moment?.ignitionOn()).toBe(true);
    await session.close();
  });

  it("keeps retrying until the sim reports it is running", async () => {
    const driver = new FakeDriver({ unavailableAttempts: 2, name: "Late Sim" });
    const started = Date.now();
    const session = await driver.connect(connectOptions({ retryDelayMs: 20 }));
    expect(session.name).toBe("Late Sim");
    expect(Date.now() - started).toBeGreaterThanOrEqual(35);
    await session.close();
  });

  it("gives up when the signal aborts", async () => {
    const controller = new AbortController();
    const pending = new FakeDriver({ unavailableAttempts: 1000 }).connect(
      connectOptions({ retryDelayMs: 20, signal: controller.signal })
    );
    const assertion = expect(pending).rejects.toThrow("stop");
    controller.abort(new Error("stop"));
    await assertion;
  });

  it("ends a waiting session when closed", async () => {
    const session = await new FakeDriver({ sampleIntervalMs: 60_000, seed: 3 }).connect(connectOptions());
    expect(await session.nextMoment()).toBeDefined();
    const next = session.nextMoment();
    await session.close();
    expect(await next).toBeUndefined();
  });
});
