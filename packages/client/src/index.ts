/**
 * # YoGuido Client
 *
 * Browser runtime for YoGuido pages. Mirrors the server's tree, patches the
 * DOM, forwards events and shows notices.
 *
 * ## Quick Start
 *
 * The Express adapter serves this package bundled at `/_yg/client.js`, and
 * the bundle starts itself. To start a client by hand:
 *
 * ```typescript
 * import { YoGuidoClient, readBootstrap } from 'yoguido-client';
 *
 * const bootstrap = readBootstrap(document);
 * if (bootstrap) {
 *   const root = document.getElementById('yg-root') ?? document.body;
 *   void new YoGuidoClient({ root, bootstrap }).start();
 * }
 * ```
 *
 * @module yoguido-client
 */

export { YoGuidoClient, type YoGuidoClientConfig, type YoGuidoClientCallbacks, type MessageOutcome } from "./client";

export { boot, readBootstrap, isBootstrapData, ROOT_ELEMENT_ID, BOOTSTRAP_ELEMENT_ID } from "./browser";

export { DomPatcher } from "./dom/patcher";
export { EventDelegator, type EventSink } from "./dom/events";
export { NoticeBanner, NOTICE_ELEMENT_ID, type NoticeBannerConfig } from "./dom/banner";

export * from "./core";

export { TransportError, DiffInvariantViolation, applyPatches } from "yoguido-shared";
export type { BootstrapData, ServerMessage, NodeSnapshot, PatchOp, WireError } from "yoguido-shared";
