/**
 * YoGuidoClient - the browser runtime.
 *
 * Keeps a snapshot mirror of the server's committed tree, validates every
 * patch against it before touching the DOM, and forwards DOM events to the
 * server. Messages are handled one at a time in arrival order:
 *
 * - `resync` replaces the mirror and remounts the page, unless it is older
 *   than the version already shown
 * - `patch` at `version + 1` is applied; an older version is ignored; a gap
 *   or a patch that does not fit the mirror triggers a resync
 * - `error` shows the banner and leaves the page as it is
 *
 * @example
 * ```typescript
 * const client = new YoGuidoClient({ root, bootstrap });
 * client.start();
 * ```
 */

import {
  applyPatches,
  indexSnapshot,
  isJsonObject,
  isServerMessage,
  isYoGuidoError,
  type BootstrapData,
  type JsonValue,
  type NodeSnapshot,
  type ServerMessage,
  type TransportError,
  type WireError,
} from "yoguido-shared";
import { HttpClient, ServerReplyError } from "./core/http";
import { EventStream } from "./core/event-stream";
import type { PushTransport } from "./core/transport";
import { NoticeBanner } from "./dom/banner";
import { EventDelegator } from "./dom/events";
import { DomPatcher } from "./dom/patcher";

export interface YoGuidoClientCallbacks {
  /** Every server message, before it is applied */
  onMessage?: (message: ServerMessage) => void;
  onError?: (error: unknown) => void;
  /** The server no longer knows the session (default: reload the page) */
  onExpired?: () => void;
}

export interface YoGuidoClientConfig {
  /** Mount point of the page tree */
  root: Element;
  bootstrap: BootstrapData;
  http?: HttpClient;
  /** Push transport; `null` disables pushed messages */
  transport?: PushTransport | null;
  banner?: NoticeBanner;
  /** Keep the address bar in step with the route (default true) */
  history?: boolean;
  callbacks?: YoGuidoClientCallbacks;
}

export type MessageOutcome = "applied" | "ignored" | "resynced" | "failed";

export class YoGuidoClient {
  readonly session: string;

  private readonly bootstrap: BootstrapData;
  private readonly http: HttpClient;
  private readonly transport: PushTransport | null;
  private readonly banner: NoticeBanner;
  private readonly patcher: DomPatcher;
  private readonly delegator: EventDelegator;
  private readonly callbacks: YoGuidoClientCallbacks;
  private readonly history: boolean;
  private readonly document: Document;
  private readonly window: Window | null;

  private mirror: NodeSnapshot | null = null;
  private _version = 0;
  private _route = "";
  private queue: Promise<unknown> = Promise.resolve();
  private expired = false;
  private started = false;
  private closeStream: (() => void) | null = null;

  private readonly onPopState = (): void => {
    if (this.window) {
      void this.navigate(this.window.location.pathname, { fromHistory: true });
    }
  };

  private readonly onPageHide = (): void => {
    this.leave().catch((error: unknown) => this.callbacks.onError?.(error));
  };

  constructor(config: YoGuidoClientConfig) {
    const document = config.root.ownerDocument;
    this.bootstrap = config.bootstrap;
    this.session = config.bootstrap.session;
    this.http = config.http ?? new HttpClient({ basePath: config.bootstrap.basePath });
    this.transport =
      config.transport !== undefined
        ? config.transport
        : config.bootstrap.stream
          ? new EventStream({ url: this.http.streamUrl(this.session) })
          : null;
    this.banner = config.banner ?? NoticeBanner.forDocument(document);
    this.patcher = new DomPatcher(config.root);
    this.delegator = new EventDelegator(config.root, (nodeId, event, payload) => {
      void this.sendEvent(nodeId, event, payload);
    });
    this.callbacks = config.callbacks ?? {};
    this.history = config.history ?? true;
    this.document = document;
    this.window = document.defaultView;
  }

  get version(): number {
    return this._version;
  }

  get route(): string {
    return this._route;
  }

  /** Mirror of the committed tree */
  get tree(): NodeSnapshot | null {
    return this.mirror;
  }

  get isExpired(): boolean {
    return this.expired;
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Mount the bootstrap message, start delegating events and open the push
   * stream.
   */
  start(): Promise<void> {
    if (this.started) return this.idle();
    this.started = true;
    this.delegator.attach();
    this.window?.addEventListener("popstate", this.onPopState);
    this.window?.addEventListener("pagehide", this.onPageHide);
    this.closeStream =
      this.transport?.open({
        frame: (data) => void this.receive(data),
        // Frames pushed while the stream was down are lost.
        resumed: () => void this.resync(),
        error: (error) => this.streamFailed(error),
      }) ?? null;
    return this.enqueue(async () => {
      await this.handle(this.bootstrap.message);
    });
  }

  dispose(): void {
    this.delegator.detach();
    this.window?.removeEventListener("popstate", this.onPopState);
    this.window?.removeEventListener("pagehide", this.onPageHide);
    this.closeStream?.();
    this.closeStream = null;
    this.started = false;
  }

  /** Resolves once every queued message has been handled */
  idle(): Promise<void> {
    return this.queue.then(() => undefined);
  }

  // ===========================================================================
  // Outbound
  // ===========================================================================

  sendEvent(nodeId: string, event: string, payload?: JsonValue): Promise<void> {
    return this.enqueue(async () => {
      const message = await this.http.event({
        session: this.session,
        node: nodeId,
        event,
        ...(payload !== undefined && { payload }),
      });
      await this.handle(message);
    });
  }

  navigate(path: string, options: { fromHistory?: boolean } = {}): Promise<void> {
    return this.enqueue(async () => {
      const message = await this.http.navigate({ session: this.session, path });
      await this.handle(message, { pushHistory: !options.fromHistory });
    });
  }

  resync(): Promise<void> {
    return this.enqueue(() => this.fetchResync());
  }

  leave(): Promise<void> {
    return this.http.leave(this.session);
  }

  // ===========================================================================
  // Inbound
  // ===========================================================================

  /**
   * Queue data received from the push transport. Of the stream control
   * frames only `expired` is acted on.
   */
  receive(data: unknown): Promise<void> {
    if (isServerMessage(data)) {
      return this.enqueue(async () => {
        await this.handle(data);
      });
    }
    if (isJsonObject(data) && data.type === "expired") {
      return this.enqueue(async () => this.expire());
    }
    return this.idle();
  }

  private async handle(message: ServerMessage, options: { pushHistory?: boolean } = {}): Promise<MessageOutcome> {
    this.callbacks.onMessage?.(message);
    switch (message.type) {
      case "resync":
        if (message.version < this._version) {
          return "ignored";
        }
        this.mount(message.fullTree, message.version, message.route, message.title, options.pushHistory ?? true);
        this.notify(message.notice);
        return "applied";

      case "patch": {
        if (message.version <= this._version) {
          return "ignored";
        }
        if (message.version !== this._version + 1) {
          await this.fetchResync();
          return "resynced";
        }
        try {
          const next = applyPatches(this.mirror, message.ops);
          this.patcher.apply(message.ops, indexSnapshot(next));
          this.mirror = next;
          this._version = message.version;
        } catch (error) {
          this.callbacks.onError?.(error);
          await this.fetchResync();
          return "resynced";
        }
        this.notify(message.notice);
        return "applied";
      }

      case "error":
        this.banner.show(message.error);
        return "failed";
    }
  }

  private async fetchResync(): Promise<void> {
    const message = await this.http.resync(this.session);
    if (message.type === "resync") {
      await this.handle(message, { pushHistory: false });
    } else {
      await this.handle(message);
    }
  }

  private mount(tree: NodeSnapshot, version: number, route: string, title: string, pushHistory: boolean): void {
    this.patcher.mount(tree);
    this.mirror = tree;
    this._version = version;
    this._route = route;

    this.document.title = title ? `${title} | ${this.bootstrap.appTitle}` : this.bootstrap.appTitle;

    const location = this.window?.location;
    if (this.history && location && location.pathname !== route) {
      if (pushHistory) {
        this.window?.history.pushState({ route }, "", route);
      } else {
        this.window?.history.replaceState({ route }, "", route);
      }
    }
  }

  private notify(notice: WireError | undefined): void {
    if (notice) {
      this.banner.show(notice);
    }
  }

  // ===========================================================================
  // Queue
  // ===========================================================================

  private enqueue(task: () => Promise<void>): Promise<void> {
    const run = this.queue.then(async () => {
      if (this.expired) return;
      try {
        await task();
      } catch (error) {
        this.fail(error);
      }
    });
    this.queue = run;
    return run;
  }

  private fail(error: unknown): void {
    this.callbacks.onError?.(error);
    if (error instanceof ServerReplyError && error.sessionExpired) {
      this.expire();
      return;
    }
    if (isYoGuidoError(error)) {
      this.banner.show({ code: error.code, message: error.message });
      return;
    }
    this.banner.show({ code: "INTERNAL_ERROR", message: "Something went wrong" });
  }

  private expire(): void {
    this.expired = true;
    this.banner.show({ code: "NOT_FOUND_SESSION", message: "Session expired. Reloading…" }, { sticky: true });
    this.dispose();
    if (this.callbacks.onExpired) {
      this.callbacks.onExpired();
    } else {
      this.window?.location.reload();
    }
  }

  private streamFailed(error: TransportError): void {
    this.callbacks.onError?.(error);
    if (error.transportCode === "connection") {
      this.banner.show({ code: error.code, message: error.message }, { sticky: true });
    }
  }
}
