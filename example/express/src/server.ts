import express from "express";
import { Logger } from "yoguido-kernel";
import { createSSETransport, createYoGuidoMiddleware } from "yoguido-express";
import { countRequest, setupApp, startTicker, stopTicker } from "./setup";

const server = express();
const PORT = +(process.env["PORT"] || 3000);

// Initialize the app on startup (also configures Logger)
const app = setupApp();
const transport = createSSETransport({ heartbeatInterval: 15000 });

const log = Logger.for("Server");

server.use((_req, _res, next) => {
  countRequest();
  next();
});

// Health check
server.get("/health", (_req, res) => {
  res.json({ status: "ok", sessions: app.store.size, streams: transport.connectionCount });
});

server.use(
  createYoGuidoMiddleware(app, {
    transport,
    onError: (error, req) => log.debug({ err: error, path: req.path }, "request failed"),
  }),
);

const listener = server.listen(PORT, () => {
  log.info({ port: PORT }, "Server started");
  log.info({ url: `http://localhost:${PORT}/` }, "Open the demo");
});

startTicker(app);

// =============================================================================
// Graceful Shutdown
// =============================================================================

function gracefulShutdown(signal: string) {
  log.info({ signal }, "Shutdown signal received");

  stopTicker();

  // Tell open pages the server is going away, then drop every session
  transport.dispose();
  app.close();

  listener.close((err) => {
    if (err) {
      log.error({ err }, "Error during shutdown");
      process.exit(1);
    }
    log.info("Server closed");
    process.exit(0);
  });

  // Force close after timeout
  setTimeout(() => {
    log.error("Forced shutdown after timeout");
    process.exit(1);
  }, 5000).unref();
}

process.once("SIGTERM", () => gracefulShutdown("SIGTERM"));
process.once("SIGINT", () => gracefulShutdown("SIGINT"));
