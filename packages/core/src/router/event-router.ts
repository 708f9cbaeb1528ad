/**
 * EventRouter - delivers browser events to the handlers of the committed tree.
 *
 * Each dispatch holds the session lock for the whole invoke/rebuild/diff/
 * commit cycle, so one session never renders twice at once while separate
 * sessions run concurrently.
 *
 * | outcome                 | reply                                  |
 * | ----------------------- | -------------------------------------- |
 * | handler ran             | patch (or resync on route change)      |
 * | handler threw           | patch with a `HANDLER_FAILED` notice   |
 * | node/handler not found  | resync of the committed tree           |
 * | handler timed out       | transient error, nothing committed     |
 * | rebuild failed          | transient error, last tree kept        |
 */

import { Context, Logger, type KernelLogger } from "yoguido-kernel";
import {
  HandlerError,
  HandlerTimeoutError,
  NotFoundError,
  StaleHandlerError,
  ensureError,
  isHandlerTimeoutError,
  type JsonValue,
  type ServerMessage,
  type WireError,
} from "yoguido-shared";
import { runInSession } from "../session/scope";
import type { RenderSession } from "../session/session";
import type { SessionStore } from "../session/store";
import type { EventHandler, HandlerEvent } from "../tree/node";

export interface EventRouterOptions {
  store: SessionStore;
  /** Abort handlers running longer than this (default: no limit) */
  handlerTimeoutMs?: number;
}

export class EventRouter {
  private readonly store: SessionStore;
  private readonly handlerTimeoutMs?: number;
  private readonly log: KernelLogger = Logger.for(this);

  constructor(options: EventRouterOptions) {
    this.store = options.store;
    this.handlerTimeoutMs = options.handlerTimeoutMs;
  }

  /**
   * Rejects with NotFoundError when the session does not exist or is
   * destroyed mid-dispatch.
   */
  async dispatch(sessionId: string, nodeId: string, eventName: string, payload?: JsonValue): Promise<ServerMessage> {
    const session = this.requireSession(sessionId);
    return Context.fork({ sessionId }, () =>
      session.exclusive(() => this.handle(session, nodeId, eventName, payload)),
    );
  }

  /**
   * Navigate and answer with the full tree.
   */
  async navigate(sessionId: string, path: string): Promise<ServerMessage> {
    const session = this.requireSession(sessionId);
    return Context.fork({ sessionId }, () =>
      session.exclusive(() => {
        const { message } = session.navigate(path);
        return message.type === "patch" ? session.resyncMessage(message.notice) : message;
      }),
    );
  }

  async resync(sessionId: string): Promise<ServerMessage> {
    const session = this.requireSession(sessionId);
    return Context.fork({ sessionId }, () => session.exclusive(() => session.resync()));
  }

  /**
   * Render state changed outside of a dispatch (background jobs, timers).
   *
   * @returns `null` when nothing changed
   */
  async refresh(sessionId: string): Promise<ServerMessage | null> {
    const session = this.requireSession(sessionId);
    return Context.fork({ sessionId }, () =>
      session.exclusive(() => session.refresh()?.message ?? null),
    );
  }

  private requireSession(sessionId: string): RenderSession {
    const session = this.store.get(sessionId);
    if (!session || session.isClosed) {
      throw new NotFoundError("session", sessionId);
    }
    return session;
  }

  private async handle(
    session: RenderSession,
    nodeId: string,
    eventName: string,
    payload: JsonValue | undefined,
  ): Promise<ServerMessage> {
    const handler = session.resolveHandler(nodeId, eventName);
    if (!handler) {
      const stale = new StaleHandlerError(nodeId, eventName);
      this.log.warn({ err: stale, nodeId, eventName }, "stale handler, sending full tree");
      return session.resync();
    }

    const controller = new AbortController();
    const event: HandlerEvent = {
      sessionId: session.id,
      nodeId,
      name: eventName,
      payload,
      signal: controller.signal,
      navigateTo: (path) => session.navigateTo(path),
      getCurrentPath: () => session.getCurrentPath(),
    };

    let notice: WireError | undefined;
    let result: unknown;
    try {
      result = await this.invoke(session, handler, event, controller);
    } catch (error) {
      if (isHandlerTimeoutError(error)) {
        this.log.error({ err: error, nodeId, eventName }, "handler timed out, render discarded");
        return session.errorMessage(error);
      }
      const failure = new HandlerError(nodeId, eventName, ensureError(error));
      this.log.error({ err: failure, nodeId, eventName }, "handler failed");
      notice = { code: failure.code, message: failure.message };
      result = false;
    }

    session.recordEvent({ nodeId, name: eventName, payload, result });
    return session.render(notice).message;
  }

  private invoke(
    session: RenderSession,
    handler: EventHandler,
    event: HandlerEvent,
    controller: AbortController,
  ): Promise<unknown> {
    const running = Promise.resolve().then(() => runInSession(session, () => handler(event)));
    const timeoutMs = this.handlerTimeoutMs;
    if (timeoutMs === undefined) {
      return running;
    }

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        const error = HandlerTimeoutError.after(timeoutMs, event.nodeId, event.name);
        controller.abort(error);
        reject(error);
      }, timeoutMs);

      void running.then(
        (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        (error: unknown) => {
          clearTimeout(timer);
          if (controller.signal.aborted) {
            this.log.warn({ err: ensureError(error), nodeId: event.nodeId }, "handler failed after timing out");
          }
          reject(error);
        },
      );
    });
  }
}
