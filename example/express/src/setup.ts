import { Registry, createApp, loadConfigFromEnv, type YoGuidoApp } from "yoguido";
import { Logger } from "yoguido-kernel";
import { adminLayout, dashboard, login, members, requireUser } from "./pages/admin";
import { counter } from "./pages/counter";
import { Load } from "./state";

let appInstance: YoGuidoApp | null = null;
let ticker: NodeJS.Timeout | null = null;
let requests = 0;

export function setupApp(): YoGuidoApp {
  // Level comes from the app config (YOGUIDO_LOG_LEVEL).
  Logger.configure({
    base: { service: "yoguido-demo", pid: process.pid },
    prettyPrint: process.env.NODE_ENV !== "production",
  });
  return getApp();
}

export function getApp(): YoGuidoApp {
  if (appInstance) {
    return appInstance;
  }

  const registry = new Registry()
    .layout("admin", adminLayout)
    .page("/", counter)
    .page("/login", login, { title: "Sign in" })
    .page("/admin", dashboard, { layout: "admin", guard: requireUser })
    .page("/admin/members", members, { layout: "admin", guard: requireUser });

  appInstance = createApp({
    registry,
    config: { title: "YoGuido Demo", ...loadConfigFromEnv(process.env) },
  }).start();

  return appInstance;
}

export function countRequest(): void {
  requests++;
}

/**
 * Push the request count and uptime to every open session once a second.
 */
export function startTicker(app: YoGuidoApp, startedAt = Date.now()): void {
  const log = Logger.for("ticker");
  ticker = setInterval(() => {
    const uptime = Math.round((Date.now() - startedAt) / 1000);
    for (const session of app.store.values()) {
      session.getState(Load)?.update({ requests, uptime });
      app.refresh(session.id).catch((error: unknown) => {
        log.warn({ err: error, session: session.id }, "refresh failed");
      });
    }
  }, 1000);
}

export function stopTicker(): void {
  if (ticker) {
    clearInterval(ticker);
    ticker = null;
  }
}
