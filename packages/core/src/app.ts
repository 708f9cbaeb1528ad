/**
 * YoGuidoApp - ties the registry, the session store and the event router
 * together behind the operations a transport needs.
 *
 * @example
 * ```typescript
 * const app = createApp({ registry, config: { title: 'Admin' } });
 * app.start();
 *
 * const { sessionId, message } = await app.openSession('/admin');
 * const html = app.renderDocument(sessionId, message);
 * ```
 */

import { randomUUID } from "node:crypto";
import { Context, Logger, type KernelLogger } from "yoguido-kernel";
import {
  NotFoundError,
  type BootstrapData,
  type ClientEvent,
  type NavigateRequest,
  type NodeSnapshot,
  type ServerMessage,
} from "yoguido-shared";
import { resolveAppConfig, type AppConfig, type AppConfigInput } from "./config";
import { HtmlRenderer, type TemplateRenderer } from "./renderers/html";
import type { Registry } from "./registry/registry";
import { EventRouter } from "./router/event-router";
import { RenderSession, type DestroyReason } from "./session/session";
import { InMemorySessionStore, type SessionStore } from "./session/store";
import { toSnapshot } from "./tree/node";

export interface CreateAppOptions {
  registry: Registry;
  config?: AppConfigInput;
  store?: SessionStore;
  renderer?: TemplateRenderer;
  generateSessionId?: () => string;
  now?: () => number;
}

/**
 * Receives messages rendered outside a request (server push).
 */
export type PushListener = (sessionId: string, message: ServerMessage) => void;

/**
 * Told about every session the app destroys.
 */
export type DestroyListener = (sessionId: string, reason: DestroyReason) => void;

export interface OpenedSession {
  sessionId: string;
  message: ServerMessage;
}

export class YoGuidoApp {
  readonly config: AppConfig;
  readonly registry: Registry;
  readonly store: SessionStore;
  readonly renderer: TemplateRenderer;
  readonly router: EventRouter;

  private readonly generateSessionId: () => string;
  private readonly now: () => number;
  private readonly listeners = new Set<PushListener>();
  private readonly destroyListeners = new Set<DestroyListener>();
  private readonly log: KernelLogger = Logger.for(this);
  private sweeper: NodeJS.Timeout | null = null;

  constructor(options: CreateAppOptions) {
    this.config = resolveAppConfig(options.config);
    this.registry = options.registry.freeze();
    this.store = options.store ?? new InMemorySessionStore();
    this.renderer = options.renderer ?? new HtmlRenderer();
    this.generateSessionId = options.generateSessionId ?? randomUUID;
    this.now = options.now ?? Date.now;
    this.router = new EventRouter({ store: this.store, handlerTimeoutMs: this.config.handlerTimeoutMs });
    Logger.setLevel(this.config.logLevel);
  }

  get basePath(): string {
    return this.config.basePath;
  }

  /**
   * Whether `path` maps to a registered page (the not-found page does not count).
   */
  isKnownPath(path: string): boolean {
    return this.registry.resolve(path).found;
  }

  hasSession(sessionId: string): boolean {
    return this.store.has(sessionId);
  }

  /**
   * Create a session, route it to `path` and render its first tree.
   */
  async openSession(path: string): Promise<OpenedSession> {
    const session = this.createSession();
    this.store.set(session);
    const message = await Context.fork({ sessionId: session.id }, () =>
      session.exclusive(() => session.navigate(path).message),
    );
    return { sessionId: session.id, message };
  }

  dispatch(event: ClientEvent): Promise<ServerMessage> {
    return this.router.dispatch(event.session, event.node, event.event, event.payload);
  }

  navigate(request: NavigateRequest): Promise<ServerMessage> {
    return this.router.navigate(request.session, request.path);
  }

  resync(sessionId: string): Promise<ServerMessage> {
    return this.router.resync(sessionId);
  }

  /**
   * Render state changed outside a request and push the result to listeners.
   *
   * @returns the pushed message, or `null` when nothing changed
   */
  async refresh(sessionId: string): Promise<ServerMessage | null> {
    const message = await this.router.refresh(sessionId);
    if (message) {
      this.push(sessionId, message);
    }
    return message;
  }

  /**
   * @returns a function that removes the listener
   */
  onPush(listener: PushListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * @returns a function that removes the listener
   */
  onDestroy(listener: DestroyListener): () => void {
    this.destroyListeners.add(listener);
    return () => {
      this.destroyListeners.delete(listener);
    };
  }

  /**
   * Destroy a session. Returns false when it did not exist.
   */
  leave(sessionId: string, reason: DestroyReason = "leave"): boolean {
    const session = this.store.get(sessionId);
    if (!session) {
      return false;
    }
    session.destroy(reason);
    this.store.delete(sessionId);
    this.destroyed(sessionId, reason);
    return true;
  }

  /**
   * Full HTML document for a freshly opened session.
   */
  renderDocument(sessionId: string, message: ServerMessage): string {
    const session = this.store.get(sessionId);
    if (!session) {
      throw new NotFoundError("session", sessionId);
    }
    const committed = session.tree;
    const tree: NodeSnapshot | null =
      message.type === "resync" ? message.fullTree : committed ? toSnapshot(committed) : null;
    const bootstrap: BootstrapData = {
      session: sessionId,
      basePath: this.config.basePath,
      appTitle: this.config.title,
      stream: true,
      message,
    };
    return this.renderer.renderDocument({
      title: message.type === "resync" ? `${message.title} | ${this.config.title}` : this.config.title,
      tree,
      bootstrap,
      scriptUrl: `${this.config.basePath}/client.js`,
      stylesheets: this.config.stylesheets,
      notice: message.type === "error" ? message.error : message.notice,
    });
  }

  /**
   * Static not-found document for a path without a page. It carries no
   * runtime, and the session that renders it is never stored.
   */
  async renderNotFound(path: string): Promise<string> {
    const session = this.createSession();
    try {
      const message = await Context.fork({ sessionId: session.id }, () =>
        session.exclusive(() => session.navigate(path).message),
      );
      return this.renderer.renderDocument({
        title: message.type === "resync" ? `${message.title} | ${this.config.title}` : this.config.title,
        tree: message.type === "resync" ? message.fullTree : null,
        stylesheets: this.config.stylesheets,
      });
    } finally {
      session.destroy("leave");
    }
  }

  /**
   * Start sweeping idle sessions.
   */
  start(): this {
    if (!this.sweeper) {
      this.sweeper = setInterval(() => this.sweep(), this.config.sweepIntervalMs);
      this.sweeper.unref();
    }
    return this;
  }

  sweep(): string[] {
    const swept = this.store.sweep(this.now(), this.config.sessionTtlMs);
    if (swept.length > 0) {
      this.log.info({ count: swept.length }, "idle sessions swept");
    }
    for (const sessionId of swept) {
      this.destroyed(sessionId, "idle");
    }
    return swept;
  }

  /**
   * Stop the sweeper and destroy every session.
   */
  close(): void {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = null;
    }
    for (const session of [...this.store.values()]) {
      this.leave(session.id, "shutdown");
    }
    this.listeners.clear();
    this.destroyListeners.clear();
  }

  private createSession(): RenderSession {
    return new RenderSession({
      id: this.generateSessionId(),
      registry: this.registry,
      appTitle: this.config.title,
      now: this.now,
    });
  }

  private destroyed(sessionId: string, reason: DestroyReason): void {
    for (const listener of this.destroyListeners) {
      try {
        listener(sessionId, reason);
      } catch (error) {
        this.log.error({ err: error, sessionId }, "destroy listener failed");
      }
    }
  }

  private push(sessionId: string, message: ServerMessage): void {
    for (const listener of this.listeners) {
      try {
        listener(sessionId, message);
      } catch (error) {
        this.log.error({ err: error, sessionId }, "push listener failed");
      }
    }
  }
}

export function createApp(options: CreateAppOptions): YoGuidoApp {
  return new YoGuidoApp(options);
}
