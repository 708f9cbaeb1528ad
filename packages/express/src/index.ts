/**
 * # YoGuido Express
 *
 * Express.js middleware for serving YoGuido apps.
 *
 * ## Features
 *
 * - **Pages** - a session and a full HTML document per page load
 * - **Protocol routes** - event, navigate, resync and leave endpoints
 * - **SSE Transport** - server-sent events for pushed messages
 * - **Client bundle** - the browser runtime, bundled with esbuild
 *
 * ## Quick Start
 *
 * ```typescript
 * import express from 'express';
 * import { createApp } from 'yoguido';
 * import { createYoGuidoMiddleware } from 'yoguido-express';
 *
 * const server = express();
 * server.use(createYoGuidoMiddleware(createApp({ registry }).start()));
 * ```
 *
 * @module yoguido-express
 */

// SSE Transport
export { SSETransport, createSSETransport } from "./transports/sse";
export type { SSETransportConfig, SSEControlFrame } from "./transports/sse";

// Middleware
export { createYoGuidoMiddleware } from "./middleware/create-middleware";
export type { YoGuidoMiddlewareConfig } from "./middleware/create-middleware";

// Client bundle
export { bundleClient, cachedScript, resolveClientEntry } from "./client-bundle";
export type { ClientBundleOptions, ClientScriptSource } from "./client-bundle";

// Re-export from server
export * from "yoguido-server";
