/**
 * EventStream - the session's `GET <basePath>/stream` over an EventSource.
 *
 * A dropped stream is retried with a doubling delay, capped and spread by
 * jitter. The browser's own fixed-delay retry is cut off by closing the
 * source on error.
 *
 * @example
 * ```typescript
 * const stream = new EventStream({ url: http.streamUrl(session) });
 * const close = stream.open({
 *   frame: (data) => client.receive(data),
 *   resumed: () => client.resync(),
 *   error: (error) => console.warn(error),
 * });
 * ```
 */

import { TransportError } from "yoguido-shared";
import type { PushTransport, StreamListener } from "./transport";

export interface EventStreamConfig {
  url: string;
  /** Delay before the first retry in ms (default 1000) */
  retryDelay?: number;
  /** Longest delay between retries in ms (default 5000) */
  maxRetryDelay?: number;
  /** Failed retries in a row before giving up (default 0, never) */
  maxRetries?: number;
  /** Spread of each delay as a fraction of it (default 0.25) */
  jitter?: number;
  createEventSource?: (url: string) => EventSource;
}

export class EventStream implements PushTransport {
  private readonly url: string;
  private readonly retryDelay: number;
  private readonly maxRetryDelay: number;
  private readonly maxRetries: number;
  private readonly jitter: number;
  private readonly createEventSource: (url: string) => EventSource;

  private listener: StreamListener | null = null;
  private source: EventSource | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private failures = 0;
  private opened = false;

  constructor(config: EventStreamConfig) {
    this.url = config.url;
    this.retryDelay = config.retryDelay ?? 1000;
    this.maxRetryDelay = config.maxRetryDelay ?? 5000;
    this.maxRetries = config.maxRetries ?? 0;
    this.jitter = config.jitter ?? 0.25;
    this.createEventSource = config.createEventSource ?? ((url) => new EventSource(url));
  }

  /** Failed attempts since the stream was last open */
  get retries(): number {
    return this.failures;
  }

  open(listener: StreamListener): () => void {
    if (this.listener) {
      throw TransportError.connection("Event stream is already open", this.url);
    }
    this.listener = listener;
    this.connect();
    return () => this.close();
  }

  private connect(): void {
    const source = this.createEventSource(this.url);
    this.source = source;

    source.onopen = () => {
      const resumed = this.opened;
      this.opened = true;
      this.failures = 0;
      if (resumed) {
        this.listener?.resumed();
      }
    };

    source.onmessage = (event: MessageEvent<string>) => {
      let data: unknown;
      try {
        data = JSON.parse(event.data);
      } catch (error) {
        const cause = error instanceof Error ? error : undefined;
        this.listener?.error(new TransportError("parse", "Malformed stream frame", { url: this.url }, cause));
        return;
      }
      this.listener?.frame(data);
    };

    source.onerror = () => {
      source.close();
      if (this.source !== source) return;
      this.source = null;
      this.scheduleRetry();
    };
  }

  private scheduleRetry(): void {
    this.failures++;
    if (this.maxRetries > 0 && this.failures > this.maxRetries) {
      const listener = this.listener;
      this.close();
      listener?.error(TransportError.connection(`Event stream lost after ${this.maxRetries} retries`, this.url));
      return;
    }
    const delay = Math.min(this.retryDelay * 2 ** (this.failures - 1), this.maxRetryDelay);
    const spread = delay * this.jitter * (Math.random() * 2 - 1);
    this.timer = setTimeout(() => {
      this.timer = null;
      this.connect();
    }, Math.round(delay + spread));
  }

  private close(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.source?.close();
    this.source = null;
    this.listener = null;
    this.failures = 0;
    this.opened = false;
  }
}
