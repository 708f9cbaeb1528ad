/**
 * Logger - Structured logging with automatic context injection
 *
 * Built on pino. Every entry picks up the request and session identifiers
 * of the current `Context` through a pino mixin.
 *
 * @example
 * ```typescript
 * import { Logger } from 'yoguido-kernel';
 *
 * Logger.configure({ level: 'debug' });
 *
 * const log = Logger.for('RenderSession');
 * log.debug({ version: 3, ops: 1 }, 'render committed');
 * ```
 */

import pino, {
  type DestinationStream,
  type Logger as PinoLogger,
  type LoggerOptions,
  type TransportSingleOptions,
  type TransportMultiOptions,
} from "pino";
import { Context, type KernelContext } from "./context";

// =============================================================================
// Types
// =============================================================================

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

/**
 * Extracts the fields of a context that go into every log entry.
 *
 * @example
 * ```typescript
 * const withUser: ContextFieldsExtractor = (ctx) => ({ user: ctx.metadata.user });
 * ```
 */
export type ContextFieldsExtractor = (ctx: KernelContext) => Record<string, unknown>;

export interface LoggerConfig {
  /** Log level (default: 'info') */
  level?: LogLevel;
  /** Pino transport configuration */
  transport?: TransportSingleOptions | TransportMultiOptions;
  /** Inject the current context into every entry (default: true) */
  includeContext?: boolean;
  contextFields?: ContextFieldsExtractor;
  /** Base properties to include in every log */
  base?: Record<string, unknown>;
  /** Write entries to this stream instead of stdout (ignored when a transport is set) */
  destination?: DestinationStream;
  /** Pretty print (default: true when NODE_ENV is 'development') */
  prettyPrint?: boolean;
  /** Replace existing config instead of merging (default: false) */
  replace?: boolean;
}

export interface LogMethod {
  (msg: string, ...args: unknown[]): void;
  (obj: Record<string, unknown>, msg?: string, ...args: unknown[]): void;
}

export interface KernelLogger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  fatal: LogMethod;

  /** Create a child logger with additional bindings */
  child(bindings: Record<string, unknown>): KernelLogger;

  readonly level: LogLevel;

  isLevelEnabled(level: LogLevel): boolean;
}

// =============================================================================
// Implementation
// =============================================================================

let globalLogger: PinoLogger | null = null;
let globalConfig: LoggerConfig = {};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Core context fields: request, trace and session ids.
 */
export const defaultContextFields: ContextFieldsExtractor = (ctx) => {
  const fields: Record<string, unknown> = {};
  if (ctx.requestId) fields.request_id = ctx.requestId;
  if (ctx.traceId) fields.trace_id = ctx.traceId;
  if (ctx.sessionId) fields.session_id = ctx.sessionId;
  return fields;
};

function getContextFields(config: LoggerConfig): Record<string, unknown> {
  if (config.includeContext === false) {
    return {};
  }
  const ctx = Context.tryGet();
  if (!ctx) {
    return {};
  }
  return (config.contextFields ?? defaultContextFields)(ctx);
}

function createPinoOptions(config: LoggerConfig): LoggerOptions {
  const usePretty = config.prettyPrint ?? process.env.NODE_ENV === "development";

  const options: LoggerOptions = {
    level: config.level ?? "info",
    base: config.base ?? { pid: process.pid },
    mixin: () => getContextFields(config),
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (config.transport) {
    options.transport = config.transport;
  } else if (usePretty && !config.destination) {
    options.transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    };
  }

  return options;
}

function createPino(config: LoggerConfig): PinoLogger {
  const options = createPinoOptions(config);
  return config.destination && !options.transport ? pino(options, config.destination) : pino(options);
}

function levelOf(pinoLogger: PinoLogger): LogLevel {
  const level = pinoLogger.level;
  return isLogLevel(level) ? level : "info";
}

function wrapLogger(pinoLogger: PinoLogger): KernelLogger {
  return {
    trace: pinoLogger.trace.bind(pinoLogger),
    debug: pinoLogger.debug.bind(pinoLogger),
    info: pinoLogger.info.bind(pinoLogger),
    warn: pinoLogger.warn.bind(pinoLogger),
    error: pinoLogger.error.bind(pinoLogger),
    fatal: pinoLogger.fatal.bind(pinoLogger),

    child(bindings: Record<string, unknown>): KernelLogger {
      return wrapLogger(pinoLogger.child(bindings));
    },

    get level(): LogLevel {
      return levelOf(pinoLogger);
    },

    isLevelEnabled(level: LogLevel): boolean {
      return pinoLogger.isLevelEnabled(level);
    },
  };
}

function getOrCreateGlobalLogger(): PinoLogger {
  if (!globalLogger) {
    globalLogger = createPino(globalConfig);
  }
  return globalLogger;
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Logger singleton.
 *
 * @example
 * ```typescript
 * Logger.configure({ level: process.env.LOG_LEVEL === 'debug' ? 'debug' : 'info' });
 *
 * class SessionSweeper {
 *   private log = Logger.for(this);
 * }
 * ```
 */
export const Logger = {
  /**
   * Configure the global logger. Merges with the previous configuration
   * unless `replace` is set.
   */
  configure(config: LoggerConfig): void {
    globalConfig = config.replace ? config : { ...globalConfig, ...config };
    globalLogger = createPino(globalConfig);
  },

  get(): KernelLogger {
    return wrapLogger(getOrCreateGlobalLogger());
  },

  /**
   * Child logger bound to a component name (or an object's class name).
   */
  for(nameOrComponent: string | object): KernelLogger {
    const name =
      typeof nameOrComponent === "string" ? nameOrComponent : nameOrComponent.constructor.name;
    return wrapLogger(getOrCreateGlobalLogger().child({ component: name }));
  },

  child(bindings: Record<string, unknown>): KernelLogger {
    return wrapLogger(getOrCreateGlobalLogger().child(bindings));
  },

  /**
   * Standalone logger that does not affect the global one.
   */
  create(config: LoggerConfig = {}): KernelLogger {
    return wrapLogger(createPino(config));
  },

  get level(): LogLevel {
    return levelOf(getOrCreateGlobalLogger());
  },

  setLevel(level: LogLevel): void {
    getOrCreateGlobalLogger().level = level;
  },

  isLevelEnabled(level: LogLevel): boolean {
    return getOrCreateGlobalLogger().isLevelEnabled(level);
  },

  /**
   * Reset the global logger (mainly for testing).
   */
  reset(): void {
    globalLogger = null;
    globalConfig = {};
  },
};

/**
 * Combine context field extractors. Later extractors win on key clashes.
 *
 * @example
 * ```typescript
 * Logger.configure({
 *   contextFields: composeContextFields(defaultContextFields, (ctx) => ({
 *     route: ctx.metadata.route,
 *   })),
 * });
 * ```
 */
export function composeContextFields(...extractors: ContextFieldsExtractor[]): ContextFieldsExtractor {
  return (ctx) => {
    const result: Record<string, unknown> = {};
    for (const extractor of extractors) {
      Object.assign(result, extractor(ctx));
    }
    return result;
  };
}

export type { DestinationStream, PinoLogger, TransportSingleOptions, TransportMultiOptions };
