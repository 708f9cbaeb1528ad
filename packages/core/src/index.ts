/**
 * # YoGuido
 *
 * Server-driven reactive UI. Pages are plain functions that call UI
 * primitives; the engine builds a tree, tracks which nodes read which
 * state, and ships minimal patches to a thin browser runtime.
 *
 * ## Key Features
 *
 * - **UI** - display, input, data, navigation and container primitives
 * - **State** - explicit `get`/`set` containers with dependency tracking
 * - **Diff** - keyed, position-aware tree diffing with a single reorder per parent
 * - **Sessions** - one serialized render loop per connected client
 * - **Routing** - registered pages, layouts and guards
 *
 * ## Quick Start
 *
 * ```typescript
 * import { Registry, createApp, defineState } from 'yoguido';
 *
 * const Counter = defineState('counter', { count: 0 });
 *
 * const registry = new Registry().page('/', (ui) => {
 *   const counter = ui.useState(Counter);
 *   ui.button(`Count: ${counter.get('count')}`, {
 *     onClick: () => counter.set('count', counter.peek('count') + 1),
 *   });
 * });
 *
 * const app = createApp({ registry }).start();
 * ```
 *
 * @see {@link createApp} - Application entry point
 * @see {@link UI} - The primitive catalogue
 * @see {@link diff} - The tree diff
 *
 * @module yoguido
 */

export * from "./app";
export * from "./config";
export * from "./diff/diff";
export * from "./registry/registry";
export * from "./renderers/html";
export * from "./router/event-router";
export * from "./session/scope";
export * from "./session/session";
export * from "./session/store";
export * from "./state/state";
export * from "./state/tracker";
export * from "./tree/builder";
export * from "./tree/ids";
export * from "./tree/node";
export * from "./ui/ui";
