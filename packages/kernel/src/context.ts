import { AsyncLocalStorage } from "node:async_hooks";
import { EventEmitter } from "node:events";
import { ContextError } from "yoguido-shared";

export interface ContextEvent {
  type: string;
  payload: unknown;
  timestamp: number;
  source: string;
  traceId: string;
}

export type ContextMetadata = Record<string, unknown>;

/**
 * Request-scoped context carried through async calls.
 * The Express adapter opens one per request; the event router forks it
 * with the session id before a handler runs.
 */
export interface KernelContext {
  requestId: string;
  traceId: string;
  /** Render session the current work belongs to */
  sessionId?: string;
  metadata: ContextMetadata;
  /** Per-request event bus */
  events: EventEmitter;
  /** Cancellation */
  signal?: AbortSignal;
}

const storage = new AsyncLocalStorage<KernelContext>();

export class Context {
  /**
   * Creates a new context object with defaults.
   */
  static create(overrides: Partial<Omit<KernelContext, "events">> = {}): KernelContext {
    return {
      requestId: overrides.requestId ?? crypto.randomUUID(),
      traceId: overrides.traceId ?? crypto.randomUUID(),
      sessionId: overrides.sessionId,
      metadata: overrides.metadata ?? {},
      events: new EventEmitter(),
      signal: overrides.signal,
    };
  }

  static run<T>(context: KernelContext, fn: () => Promise<T>): Promise<T> {
    return storage.run(context, fn);
  }

  /**
   * Shallow copy of the current context (or a new root) with overrides applied.
   * The event bus and metadata object are shared with the parent.
   */
  static child(overrides: Partial<KernelContext> = {}): KernelContext {
    const parent = Context.tryGet();
    if (!parent) {
      return Context.create(overrides);
    }
    return { ...parent, ...overrides };
  }

  /**
   * `child()` + `run()`.
   *
   * @example
   * ```typescript
   * await Context.fork({ sessionId }, () => router.dispatch(sessionId, nodeId, 'click'));
   * ```
   */
  static fork<T>(overrides: Partial<KernelContext>, fn: () => Promise<T>): Promise<T> {
    return Context.run(Context.child(overrides), fn);
  }

  /**
   * Gets the current context. Throws if not found.
   */
  static get(): KernelContext {
    const store = storage.getStore();
    if (!store) {
      throw ContextError.notFound();
    }
    return store;
  }

  static tryGet(): KernelContext | undefined {
    return storage.getStore();
  }

  /**
   * Emit an event on the current context's bus (no-op outside a context).
   */
  static emit(type: string, payload: unknown, source: string = "system"): void {
    const ctx = Context.tryGet();
    if (!ctx) return;

    const event: ContextEvent = {
      type,
      payload,
      timestamp: Date.now(),
      source,
      traceId: ctx.traceId,
    };
    ctx.events.emit(type, event);
    ctx.events.emit("*", event);
  }
}
