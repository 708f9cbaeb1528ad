/**
 * Express Middleware Factory
 *
 * Creates an Express router that serves YoGuido pages and the endpoints the
 * browser runtime talks to. This is the main entry point for most Express
 * applications.
 *
 * @example
 * ```typescript
 * import express from 'express';
 * import { createApp } from 'yoguido';
 * import { createYoGuidoMiddleware } from 'yoguido-express';
 *
 * const app = createApp({ registry }).start();
 * const server = express();
 *
 * server.use(createYoGuidoMiddleware(app));
 * server.listen(3000);
 * ```
 *
 * Routes (with the default `basePath`):
 *
 * - `GET <page path>` - open a session and render the full document
 * - `POST /_yg/event` - dispatch a browser event
 * - `POST /_yg/navigate` - switch the session to another page
 * - `POST /_yg/resync` - resend the committed tree
 * - `POST /_yg/leave` - destroy the session
 * - `GET /_yg/stream` - server-sent events for pushed messages
 * - `GET /_yg/client.js` - the browser runtime
 */

import express, { Router, type Request, type RequestHandler, type Response } from "express";
import { Context, Logger } from "yoguido-kernel";
import { NotFoundError, ValidationError, type ServerMessage } from "yoguido-shared";
import {
  attachContext,
  defaultContextExtractor,
  parseClientEvent,
  parseNavigateRequest,
  parseSessionRequest,
  requireContext,
  toHttpError,
  type ContextExtractor,
} from "yoguido-server";
import type { YoGuidoApp } from "yoguido";
import { bundleClient, cachedScript, type ClientScriptSource } from "../client-bundle";
import { createSSETransport, type SSETransport } from "../transports/sse";

// =============================================================================
// Types
// =============================================================================

export interface YoGuidoMiddlewareConfig {
  /**
   * Push transport; a fresh SSE transport is created when omitted.
   * Either way it is bound to the app.
   */
  transport?: SSETransport;

  /**
   * Browser runtime served at `<basePath>/client.js` (default: esbuild bundle
   * of `yoguido-client`, built on first request).
   */
  clientScript?: ClientScriptSource;

  /**
   * Custom context extraction (optional, uses defaults)
   */
  extractContext?: ContextExtractor;

  /**
   * JSON body size limit (default "100kb")
   */
  bodyLimit?: string;

  /**
   * Called on request errors before the error reply is sent (optional)
   */
  onError?: (error: unknown, req: Request) => void;
}

type RouteHandler = (req: Request, res: Response) => Promise<void>;

// =============================================================================
// Factory Function
// =============================================================================

/**
 * Creates the YoGuido router. Mount it at the root of the Express app; page
 * paths are matched as they are registered.
 */
export function createYoGuidoMiddleware(app: YoGuidoApp, config: YoGuidoMiddlewareConfig = {}): Router {
  const router = Router();
  const base = app.basePath;
  const extract = config.extractContext ?? defaultContextExtractor;
  const transport = (config.transport ?? createSSETransport()).bind(app);
  const clientScript = cachedScript(config.clientScript ?? (() => bundleClient()));
  const log = Logger.for("yoguido-express");

  const fail = (error: unknown, req: Request, res: Response): void => {
    config.onError?.(error, req);
    const { status, body } = toHttpError(error);
    if (status >= 500) {
      log.error({ err: error, path: req.path }, "request failed");
    }
    if (res.headersSent) {
      res.end();
      return;
    }
    res.status(status).json(body);
  };

  /**
   * Runs a handler inside a request context and maps its errors to replies.
   */
  const route =
    (handler: RouteHandler): RequestHandler =>
    async (req, res) => {
      try {
        const requestContext = requireContext(req);
        await Context.run(
          Context.create({
            requestId: requestContext.requestId,
            traceId: requestContext.traceId,
            sessionId: requestContext.sessionId,
          }),
          () => handler(req, res),
        );
      } catch (error) {
        fail(error, req, res);
      }
    };

  const reply = (res: Response, message: ServerMessage): void => {
    res.setHeader("Cache-Control", "no-store");
    res.json(message);
  };

  router.use(base, express.json({ limit: config.bodyLimit ?? "100kb" }));

  router.use((req, res, next) => {
    const context = extract(req.body, req.headers, req.query);
    attachContext(req, context);
    res.setHeader("X-Request-Id", context.requestId);
    next();
  });

  // ===========================================================================
  // Protocol endpoints
  // ===========================================================================

  router.post(
    `${base}/event`,
    route(async (req, res) => {
      reply(res, await app.dispatch(parseClientEvent(req.body)));
    }),
  );

  router.post(
    `${base}/navigate`,
    route(async (req, res) => {
      reply(res, await app.navigate(parseNavigateRequest(req.body)));
    }),
  );

  router.post(
    `${base}/resync`,
    route(async (req, res) => {
      reply(res, await app.resync(parseSessionRequest(req.body).session));
    }),
  );

  router.post(
    `${base}/leave`,
    route(async (req, res) => {
      const { session } = parseSessionRequest(req.body);
      res.json({ left: app.leave(session, "leave") });
    }),
  );

  router.get(
    `${base}/stream`,
    route(async (req, res) => {
      const { sessionId } = requireContext(req);
      if (!sessionId) {
        throw ValidationError.required("session", "session is required to open an event stream");
      }
      if (!app.hasSession(sessionId)) {
        throw new NotFoundError("session", sessionId);
      }
      transport.connect(sessionId, res);
    }),
  );

  router.get(
    `${base}/client.js`,
    route(async (_req, res) => {
      const script = await clientScript();
      res.setHeader("Cache-Control", "no-cache");
      res.type("application/javascript").send(script);
    }),
  );

  // ===========================================================================
  // Pages
  // ===========================================================================

  router.get(
    "*",
    route(async (req, res) => {
      if (req.path === base || req.path.startsWith(`${base}/`)) {
        throw new NotFoundError("resource", req.path);
      }
      res.setHeader("Cache-Control", "no-store");
      if (!app.isKnownPath(req.path)) {
        res.status(404).type("html").send(await app.renderNotFound(req.path));
        return;
      }
      const { sessionId, message } = await app.openSession(req.path);
      res.status(200).type("html").send(app.renderDocument(sessionId, message));
    }),
  );

  return router;
}
