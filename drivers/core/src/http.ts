import type { z } from "zod";
import { BaseSimetry } from "./simetry";
import { linkSignal, sleep } from "./signals";
import type { Moment, SimetryLogger } from "./types";

export type PayloadSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface FetchJsonOptions {
  signal: AbortSignal;
  timeoutMs: number;
}

/** GETs `uri` and validates the JSON body. Throws on HTTP or schema errors. */
export async function fetchJson<T>(uri: string, schema: PayloadSchema<T>, options: FetchJsonOptions): Promise<T> {
  const { signal, cleanup } = linkSignal(options.signal, options.timeoutMs);
  try {
    const res = await fetch(uri, { signal, headers: { accept: "application/json" } });
    if (!res.ok) {
      throw new Error(`GET ${uri} failed with ${res.status}`);
    }
    const json: unknown = await res.json();
    return schema.parse(json);
  } finally {
    cleanup();
  }
}

export interface HttpPollingOptions {
  uri: string;
  /** Minimum time between two requests. */
  pollIntervalMs: number;
  requestTimeoutMs: number;
  /** The session ends once no request has succeeded for this long. */
  connectionLostAfterMs: number;
  logger: SimetryLogger;
}

/** Least wait before repeating a failed request. */
const FAILED_POLL_RETRY_MS = 50;

/**
 * Session over a sim that serves its state on an HTTP endpoint. Every
 * `nextMoment` performs one request, spaced at least `pollIntervalMs` apart.
 * Failed requests are repeated; the session ends once none has succeeded for
 * `connectionLostAfterMs`.
 */
export abstract class HttpPollingSimetry<TPayload> extends BaseSimetry {
  private readonly closed = new AbortController();
  private pending: TPayload | undefined;
  private lastPollAt: number;
  private lastSuccessAt: number;

  protected constructor(
    protected readonly options: HttpPollingOptions,
    private readonly schema: PayloadSchema<TPayload>,
    initial: TPayload
  ) {
    super(options.logger);
    this.pending = initial;
    this.lastPollAt = Date.now();
    this.lastSuccessAt = this.lastPollAt;
  }

  /** Maps a payload to a moment; `undefined` ends the session. */
  protected abstract toMoment(payload: TPayload): Moment | undefined;

  protected async readMoment(): Promise<Moment | undefined> {
    const payload = this.pending ?? (await this.poll());
    this.pending = undefined;
    return payload === undefined ? undefined : this.toMoment(payload);
  }

  protected async release(): Promise<void> {
    this.closed.abort();
  }

  private async poll(): Promise<TPayload | undefined> {
    const { uri, pollIntervalMs, requestTimeoutMs, connectionLostAfterMs } = this.options;
    let interval = pollIntervalMs;

    for (;;) {
      try {
        const wait = this.lastPollAt + interval - Date.now();
        if (wait > 0) {
          await sleep(wait, this.closed.signal);
        }
        this.lastPollAt = Date.now();
        const payload = await fetchJson(uri, this.schema, {
          signal: this.closed.signal,
          timeoutMs: requestTimeoutMs
        });
        this.lastSuccessAt = Date.now();
        return payload;
      } catch (error) {
        if (this.closed.signal.aborted) {
          return undefined;
        }
        const message = error instanceof Error ? error.message : String(error);
        if (Date.now() - this.lastSuccessAt >= connectionLostAfterMs) {
          this.logger.info(`${this.name}: lost connection`, { uri, error: message });
          return undefined;
        }
        this.logger.debug(`${this.name}: request failed, retrying`, { uri, error: message });
        interval = Math.max(pollIntervalMs, FAILED_POLL_RETRY_MS);
      }
    }
  }
}
