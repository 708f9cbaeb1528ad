/**
 * Server-Sent Events transport.
 *
 * Holds one event stream per render session and pushes server messages
 * that were not produced by a request (a session refreshed from outside,
 * a shutdown notice). Closing the stream ends the session, and ending the
 * session closes its stream.
 *
 * @example
 * ```typescript
 * const transport = createSSETransport({ heartbeatInterval: 15000 });
 * transport.bind(app);
 *
 * router.get('/_yg/stream', (req, res) => transport.connect(sessionId, res));
 * ```
 */

import type { Response } from "express";
import { Logger, type KernelLogger } from "yoguido-kernel";
import type { ServerMessage } from "yoguido-shared";
import type { YoGuidoApp } from "yoguido";

// =============================================================================
// Types
// =============================================================================

export interface SSETransportConfig {
  /** Heartbeat interval in ms (default 30000, 0 disables) */
  heartbeatInterval?: number;
  /** Maximum concurrent streams (default unlimited) */
  maxConnections?: number;
  /** Called after a stream closes */
  onDisconnect?: (sessionId: string) => void;
}

/**
 * Control frames written next to server messages.
 */
export type SSEControlFrame =
  | { type: "connected"; session: string }
  | { type: "expired"; session: string }
  | { type: "server_shutdown" };

interface SSEConnection {
  res: Response;
  heartbeat?: NodeJS.Timeout;
  connectedAt: number;
}

// =============================================================================
// Transport
// =============================================================================

export class SSETransport {
  private readonly connections = new Map<string, SSEConnection>();
  private readonly config: Required<Omit<SSETransportConfig, "onDisconnect">> &
    Pick<SSETransportConfig, "onDisconnect">;
  private readonly log: KernelLogger = Logger.for(this);
  private unbind: (() => void) | null = null;

  constructor(config: SSETransportConfig = {}) {
    this.config = {
      heartbeatInterval: config.heartbeatInterval ?? 30000,
      maxConnections: config.maxConnections ?? Infinity,
      onDisconnect: config.onDisconnect,
    };
  }

  /**
   * Forward the app's pushed messages to their streams, destroy a session
   * when its stream closes, and close the stream of a session the app
   * destroyed.
   */
  bind(app: YoGuidoApp): this {
    this.unbind?.();
    const stopPush = app.onPush((sessionId, message) => {
      this.send(sessionId, message);
    });
    const stopDestroy = app.onDestroy((sessionId, reason) => {
      const frame: SSEControlFrame =
        reason === "shutdown" ? { type: "server_shutdown" } : { type: "expired", session: sessionId };
      this.close(sessionId, frame);
    });
    const previous = this.config.onDisconnect;
    this.config.onDisconnect = (sessionId) => {
      previous?.(sessionId);
      app.leave(sessionId, "disconnect");
    };
    this.unbind = () => {
      stopPush();
      stopDestroy();
      this.config.onDisconnect = previous;
      this.unbind = null;
    };
    return this;
  }

  /**
   * Open the stream for a session. A second stream for the same session
   * replaces the first.
   *
   * @returns false when the connection limit is reached (a 503 was sent)
   */
  connect(sessionId: string, res: Response): boolean {
    const existing = this.connections.get(sessionId);
    if (existing) {
      this.log.debug({ sessionId }, "replacing event stream");
      this.release(sessionId, existing);
      existing.res.end();
    } else if (this.connections.size >= this.config.maxConnections) {
      this.log.warn({ sessionId, limit: this.config.maxConnections }, "event stream limit reached");
      res.status(503).json({ error: { code: "TRANSPORT_CONNECTION", message: "Too many event streams" } });
      return false;
    }

    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.setHeader("X-Accel-Buffering", "no");
    res.flushHeaders();

    const connection: SSEConnection = { res, connectedAt: Date.now() };
    if (this.config.heartbeatInterval > 0) {
      connection.heartbeat = setInterval(() => {
        res.write(": heartbeat\n\n");
      }, this.config.heartbeatInterval);
    }
    this.connections.set(sessionId, connection);

    res.on("close", () => {
      // A replaced stream closes after its successor registered.
      if (this.connections.get(sessionId) !== connection) return;
      this.release(sessionId, connection);
      this.log.debug({ sessionId }, "event stream closed");
      this.config.onDisconnect?.(sessionId);
    });

    this.write(res, { type: "connected", session: sessionId });
    this.log.debug({ sessionId }, "event stream opened");
    return true;
  }

  /**
   * @returns false when the session has no open stream
   */
  send(sessionId: string, message: ServerMessage): boolean {
    const connection = this.connections.get(sessionId);
    if (!connection) {
      return false;
    }
    this.write(connection.res, message);
    return true;
  }

  /**
   * Write a final frame and end a session's stream without triggering
   * `onDisconnect`.
   *
   * @returns false when the session has no open stream
   */
  close(sessionId: string, frame: SSEControlFrame = { type: "expired", session: sessionId }): boolean {
    const connection = this.connections.get(sessionId);
    if (!connection) {
      return false;
    }
    this.release(sessionId, connection);
    this.write(connection.res, frame);
    connection.res.end();
    this.log.debug({ sessionId, frame: frame.type }, "event stream closed by server");
    return true;
  }

  isConnected(sessionId: string): boolean {
    return this.connections.has(sessionId);
  }

  getConnectedSessions(): string[] {
    return [...this.connections.keys()];
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  /**
   * Notify and close every stream without triggering `onDisconnect`.
   */
  closeAll(): void {
    for (const sessionId of [...this.connections.keys()]) {
      this.close(sessionId, { type: "server_shutdown" });
    }
  }

  /**
   * `closeAll()` and detach from the app.
   */
  dispose(): void {
    this.closeAll();
    this.unbind?.();
  }

  private release(sessionId: string, connection: SSEConnection): void {
    if (connection.heartbeat) {
      clearInterval(connection.heartbeat);
    }
    this.connections.delete(sessionId);
  }

  private write(res: Response, frame: ServerMessage | SSEControlFrame): void {
    res.write(`data: ${JSON.stringify(frame)}\n\n`);
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createSSETransport(config?: SSETransportConfig): SSETransport {
  return new SSETransport(config);
}
