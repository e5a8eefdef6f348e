import http from "node:http";
import { afterEach, describe, expect, it } from "vitest";
import { noopLogger } from "@pitwall/driver-core";
import { GenericHttpDriver } from "../src/generic-http";
import { GenericHttpDriverConfigSchema } from "../src/config";

type Responder = (requestNumber: number) => { status: number; body?: unknown };

interface TestServer {
  uri: string;
  requests: () => number;
  close: () => Promise<void>;
}

function createServer(respond: Responder): Promise<TestServer> {
  return new Promise((resolve) => {
    let requests = 0;
    const server = http.createServer((_req, res) => {
      requests += 1;
      const { status, body } = respond(requests);
      res.writeHead(status, { "content-type": "application/json" });
      res.end(body === undefined ? "" : JSON.stringify(body));
    });
    server.listen(0, "127.0.0.1", () => {
      const addr = server.address();
      const port = typeof addr === "object" && addr ? addr.port : 0;
      resolve({
        uri: `http://127.0.0.1:${port}/`,
        requests: () => requests,
        close: () =>
          new Promise<void>((res) => {
            server.closeAllConnections();
            server.close(() => res());
          })
      });
    });
  });
}

const payload = {
  name: "Test Sim",
  vehicleLeft: true,
  basicTelemetry: { gear: 4, speed: 50, engineRotationSpeed: 600, maxEngineRotationSpeed: 800 },
  shiftPoint: 750,
  flags: { yellow: true },
  vehicleUniqueId: "car-42"
};

describe("GenericHttpDriver", () => {
  let server: TestServer | undefined;

  afterEach(async () => {
    await server?.close();
    server = undefined;
  });

  it("connects and maps the payload onto a moment", async () => {
    server = await createServer(() => ({ status: 200, body: payload }));
    const driver = new GenericHttpDriver({ pollIntervalMs: 0 });
    const session = await driver.connect({
      uri: server.uri,
      retryDelayMs: 10,
      signal: new AbortController().signal,
      logger: noopLogger
    });

    expect(session.name).toBe("Test Sim");
    const moment = await session.nextMoment();
    expect(server.requests()).toBe(1);
    expect(moment?.vehicleLeft()).toBe(true);
    expect(moment?.vehicleRight()).toBe(false);
    expect(moment?.basicTelemetry()?.gear).toBe(4);
    expect(moment?.basicTelemetry()?.speed.metersPerSecond).toBe(50);
    expect(moment?.basicTelemetry()?.pitLimiterEngaged).toBe(false);
    expect(moment?.shiftPoint()?.radiansPerSecond).toBe(750);
    expect(moment?.flags().yellow).toBe(true);
    expect(moment?.flags().checkered).toBe(false);
    expect(moment?.vehicleUniqueId()).toBe("car-42");
    expect(moment?.ignitionOn()).toBe(true);
    expect(moment?.starterOn()).toBe(false);

    await session.nextMoment();
    expect(server.requests()).toBe(2);
    await session.close();
  });

  it("falls back to moment defaults for fields the source omits", async () => {
    server = await createServer(() => ({ status: 200, body: { name: "Bare Sim" } }));
    const session = await new GenericHttpDriver().connect({
      uri: server.uri,
      retryDelayMs: 10,
      signal: new AbortController().signal,
      logger: noopLogger
    });
    const moment = await session.nextMoment();
    expect(moment?.basicTelemetry()).toBeUndefined();
    expect(moment?.shiftPoint()).toBeUndefined();
    expect(moment?.vehicleUniqueId()).toBeUndefined();
    expect(moment?.ignitionOn()).toBe(true);
    await session.close();
  });

  it("retries while the source is unavailable or malformed", async () => {
    server = await createServer((n) => {
      if (n === 1) return { status: 503 };
      if (n === 2) return { status: 200, body: { vehicleLeft: true } };
      return { status: 200, body: payload };
    });
    const session = await new GenericHttpDriver().connect({
      uri: server.uri,
      retryDelayMs: 10,
      signal: new AbortController().signal,
      logger: noopLogger
    });
    expect(server.requests()).toBe(3);
    expect(session.name).toBe("Test Sim");
    await session.close();
  });

  it("rides out a failed request and keeps the session open", async () => {
    server = await createServer((n) => (n === 3 ? { status: 500 } : { status: 200, body: payload }));
    const session = await new GenericHttpDriver({ pollIntervalMs: 0 }).connect({
      uri: server.uri,
      retryDelayMs: 10,
      signal: new AbortController().signal,
      logger: noopLogger
    });

    const received: boolean[] = [];
    for (let i = 0; i < 4; i += 1) {
      received.push((await session.nextMoment()) !== undefined);
    }

    expect(received).toEqual([true, true, true, true]);
    expect(server.requests()).toBe(5);
    await session.close();
  });

  it("ends the session once the source has stopped answering for the loss window", async () => {
    server = await createServer((n) => (n <= 2 ? { status: 200, body: payload } : { status: 500 }));
    const session = await new GenericHttpDriver({ pollIntervalMs: 0, connectionLostAfterMs: 100 }).connect({
      uri: server.uri,
      retryDelayMs: 10,
      signal: new AbortController().signal,
      logger: noopLogger
    });

    expect(await session.nextMoment()).toBeDefined();
    expect(await session.nextMoment()).toBeDefined();
    expect(await session.nextMoment()).toBeUndefined();
    expect(await session.nextMoment()).toBeUndefined();

    const seen = server.requests();
    expect(seen).toBeGreaterThan(3);
    await new Promise((res) => setTimeout(res, 80));
    expect(server.requests()).toBe(seen);
  });

  it("stops polling when the connection attempt is aborted", async () => {
    server = await createServer(() => ({ status: 503 }));
    const controller = new AbortController();
    const pending = new GenericHttpDriver().connect({
      uri: server.uri,
      retryDelayMs: 20,
      signal: controller.signal,
      logger: noopLogger
    });
    const assertion = expect(pending).rejects.toThrow("cancelled");

    await new Promise((res) => setTimeout(res, 50));
    controller.abort(new Error("cancelled"));
    await assertion;

    const seen = server.requests();
    await new Promise((res) => setTimeout(res, 60));
    expect(server.requests()).toBe(seen);
  });
});

describe("GenericHttpDriverConfigSchema", () => {
  it("fills in polling defaults", () => {
    expect(GenericHttpDriverConfigSchema.parse({})).toEqual({
      uri: "http://localhost:25055/",
      pollIntervalMs: 16,
      requestTimeoutMs: 2000,
      connectionLostAfterMs: 5000
    });
  });

  it("rejects a negative poll interval", () => {
    expect(() => GenericHttpDriverConfigSchema.parse({ pollIntervalMs: -1 })).toThrow();
  });
});
