/**
 * Browser entry point, bundled and served at `<basePath>/client.js`.
 *
 * Reads the bootstrap data the server embedded in `#yg-bootstrap` and starts
 * a client on `#yg-root`.
 */

import { isJsonObject, isServerMessage, type BootstrapData } from "yoguido-shared";
import { YoGuidoClient, type YoGuidoClientConfig } from "./client";

export const ROOT_ELEMENT_ID = "yg-root";
export const BOOTSTRAP_ELEMENT_ID = "yg-bootstrap";

export function isBootstrapData(value: unknown): value is BootstrapData {
  return (
    isJsonObject(value) &&
    typeof value.session === "string" &&
    typeof value.basePath === "string" &&
    typeof value.appTitle === "string" &&
    typeof value.stream === "boolean" &&
    isServerMessage(value.message)
  );
}

/**
 * Parse the embedded bootstrap data, or `null` when the page has none.
 */
export function readBootstrap(document: Document): BootstrapData | null {
  const text = document.getElementById(BOOTSTRAP_ELEMENT_ID)?.textContent;
  if (!text) return null;
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    return null;
  }
  return isBootstrapData(data) ? data : null;
}

/**
 * Start a client for the page, or return `null` when it carries no
 * YoGuido bootstrap.
 */
export function boot(
  document: Document,
  overrides: Omit<Partial<YoGuidoClientConfig>, "root" | "bootstrap"> = {},
): YoGuidoClient | null {
  const root = document.getElementById(ROOT_ELEMENT_ID);
  const bootstrap = readBootstrap(document);
  if (!root || !bootstrap) return null;
  const client = new YoGuidoClient({ ...overrides, root, bootstrap });
  void client.start();
  return client;
}

if (typeof document !== "undefined" && document.getElementById(BOOTSTRAP_ELEMENT_ID)) {
  if (document.readyState === "loading") {
    document.addEventListener("DOMContentLoaded", () => boot(document), { once: true });
  } else {
    boot(document);
  }
}
