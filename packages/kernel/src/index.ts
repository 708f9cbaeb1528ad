/**
 * # YoGuido Kernel
 *
 * Low-level infrastructure shared by the engine and its transports.
 *
 * - **Context** - request-scoped state propagated with AsyncLocalStorage
 * - **Logger** - pino-based structured logging with context injection
 * - **Mutex** - FIFO lock that serializes work on one render session
 *
 * ```typescript
 * import { Context, Logger } from 'yoguido-kernel';
 *
 * await Context.run(Context.create({ sessionId }), async () => {
 *   Logger.for('Example').info('inside a session');
 * });
 * ```
 *
 * @module yoguido-kernel
 */

export * from "./context";
export * from "./logger";
export * from "./mutex";
