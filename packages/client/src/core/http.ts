/**
 * HTTP side of the protocol: events, navigation, resync and leave requests.
 */

import {
  TransportError,
  isJsonObject,
  isServerMessage,
  isYoGuidoErrorCode,
  type ClientEvent,
  type JsonObject,
  type NavigateRequest,
  type ServerMessage,
  type YoGuidoErrorCode,
} from "yoguido-shared";

export interface HttpClientConfig {
  /** Mount point of the engine routes, e.g. `/_yg` */
  basePath: string;
  /** Request timeout in ms (0 disables, default 30000) */
  requestTimeout?: number;
  fetch?: typeof fetch;
}

/**
 * Error reply of the server, carried on a `TransportError`.
 */
export class ServerReplyError extends TransportError {
  constructor(
    readonly serverCode: YoGuidoErrorCode | undefined,
    statusCode: number,
    url: string,
    message: string,
  ) {
    super("response", message, { statusCode, url });
    this.name = "ServerReplyError";
  }

  get sessionExpired(): boolean {
    return this.statusCode === 404 && this.serverCode === "NOT_FOUND_SESSION";
  }
}

export class HttpClient {
  private readonly basePath: string;
  private readonly requestTimeout: number;
  private readonly fetchImpl: typeof fetch;

  constructor(config: HttpClientConfig) {
    this.basePath = config.basePath;
    this.requestTimeout = config.requestTimeout ?? 30000;
    this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init));
  }

  event(event: ClientEvent): Promise<ServerMessage> {
    return this.message("event", event);
  }

  navigate(request: NavigateRequest): Promise<ServerMessage> {
    return this.message("navigate", request);
  }

  resync(session: string): Promise<ServerMessage> {
    return this.message("resync", { session });
  }

  /**
   * Tell the server the page is going away. Uses a keepalive request so it
   * survives page unload.
   */
  async leave(session: string): Promise<void> {
    await this.post("leave", { session }, { keepalive: true });
  }

  streamUrl(session: string): string {
    return `${this.basePath}/stream?session=${encodeURIComponent(session)}`;
  }

  // ===========================================================================
  // Request Helpers
  // ===========================================================================

  private async message(route: string, body: unknown): Promise<ServerMessage> {
    const data = await this.post(route, body);
    if (!isServerMessage(data)) {
      throw new TransportError("parse", `Unexpected reply from ${this.basePath}/${route}`, {
        url: `${this.basePath}/${route}`,
      });
    }
    return data;
  }

  private async post(route: string, body: unknown, init: RequestInit = {}): Promise<unknown> {
    const url = `${this.basePath}/${route}`;
    const response = await this.fetchWithTimeout(url, {
      ...init,
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });

    const data: unknown = await response.json().catch(() => null);
    if (!response.ok) {
      const error: JsonObject = isJsonObject(data) && isJsonObject(data.error) ? data.error : {};
      const code = isYoGuidoErrorCode(error.code) ? error.code : undefined;
      const message = typeof error.message === "string" ? error.message : response.statusText;
      throw new ServerReplyError(code, response.status, url, message || `HTTP ${response.status}`);
    }
    return data;
  }

  /**
   * Fetch with timeout support.
   * If requestTimeout is 0, no timeout is applied.
   */
  private async fetchWithTimeout(url: string, options: RequestInit): Promise<Response> {
    const timeout = this.requestTimeout;

    if (timeout <= 0) {
      return this.fetchImpl(url, options);
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
      return await this.fetchImpl(url, { ...options, signal: controller.signal });
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new TransportError("timeout", `Request timed out after ${timeout}ms`, { url }, error);
      }
      const cause = error instanceof Error ? error : undefined;
      throw TransportError.connection(`Request to ${url} failed`, url, cause);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
