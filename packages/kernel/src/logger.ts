/**
 * Logger - Structured logging with automatic context injection
 *
 * Built on pino, with the current composer id and pass number injected into
 * every record while a pass or a spawned task is running.
 *
 * @example
 * ```typescript
 * import { Logger } from 'arbor-kernel';
 *
 * // Module-level loggers follow later configuration
 * const log = Logger.for('Composer');
 *
 * Logger.configure({ level: 'debug' });
 * log.debug({ recomposed: 3 }, 'Pass complete');
 * ```
 */

import pino, { type DestinationStream, type Logger as PinoLogger, type LoggerOptions } from "pino";
import { Context } from "./context";

// =============================================================================
// Types
// =============================================================================

/**
 * Log levels, least to most severe. `silent` disables logging.
 */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

function toLogLevel(value: string, fallback: LogLevel = "info"): LogLevel {
  return isLogLevel(value) ? value : fallback;
}

export interface LoggerConfig {
  /** Log level (default: `LOG_LEVEL` from the environment, else 'info') */
  level?: LogLevel;
  /** Inject `composer_id` and `pass` from the kernel context (default: true) */
  includeContext?: boolean;
  /** Pretty print through pino-pretty (default: true if NODE_ENV === 'development') */
  prettyPrint?: boolean;
  /** Write records here instead of stdout; disables pretty printing */
  destination?: DestinationStream;
}

/**
 * @example
 * ```typescript
 * log.info('Composer running');
 * log.warn({ err }, 'Pass failed');
 * ```
 */
export type LogMethod = (objOrMsg: Record<string, unknown> | string, msg?: string) => void;

export interface KernelLogger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  fatal: LogMethod;

  /** Logger with `bindings` added to every record */
  child(bindings: Record<string, unknown>): KernelLogger;
}

type EmitLevel = Exclude<LogLevel, "silent">;

// =============================================================================
// Implementation
// =============================================================================

let config: LoggerConfig = {};
let root: PinoLogger | null = null;
// Bumped whenever the root logger is replaced or its level changes.
let generation = 0;

function contextFields(): Record<string, unknown> {
  if (config.includeContext === false) {
    return {};
  }
  const ctx = Context.tryGet();
  if (!ctx) {
    return {};
  }

  const fields: Record<string, unknown> = {};
  if (ctx.composerId) fields.composer_id = ctx.composerId;
  if (ctx.pass > 0) fields.pass = ctx.pass;
  return fields;
}

function createPino(current: LoggerConfig): PinoLogger {
  const options: LoggerOptions = {
    level: current.level ?? toLogLevel(process.env.LOG_LEVEL ?? "info"),
    base: { pid: process.pid },
    mixin: contextFields,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (current.destination) {
    return pino(options, current.destination);
  }
  if (current.prettyPrint ?? process.env.NODE_ENV === "development") {
    options.transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    };
  }
  return pino(options);
}

function rootLogger(): PinoLogger {
  if (!root) {
    root = createPino(config);
  }
  return root;
}

/**
 * Logger that resolves its pino child lazily, so loggers created at module
 * load pick up `configure`, `setLevel` and `reset` made afterwards.
 */
function boundLogger(bindings: Record<string, unknown>): KernelLogger {
  let cached: PinoLogger | null = null;
  let cachedGeneration = -1;

  const resolve = (): PinoLogger => {
    if (!cached || cachedGeneration !== generation) {
      cached = rootLogger().child(bindings);
      cachedGeneration = generation;
    }
    return cached;
  };

  const method =
    (level: EmitLevel): LogMethod =>
    (objOrMsg, msg) => {
      const target = resolve();
      if (typeof objOrMsg === "string") {
        target[level](objOrMsg);
      } else {
        target[level](objOrMsg, msg);
      }
    };

  return {
    trace: method("trace"),
    debug: method("debug"),
    info: method("info"),
    warn: method("warn"),
    error: method("error"),
    fatal: method("fatal"),
    child: (more) => boundLogger({ ...bindings, ...more }),
  };
}

// =============================================================================
// Public API
// =============================================================================

export const Logger = {
  /**
   * Merge `next` into the global configuration and rebuild the root logger.
   */
  configure(next: LoggerConfig): void {
    config = { ...config, ...next };
    root = null;
    generation++;
  },

  get(): KernelLogger {
    return boundLogger({});
  },

  /**
   * Logger bound to `component`: the given name, or an object's class name.
   *
   * @example
   * ```typescript
   * const log = Logger.for('Runtime');
   *
   * class HostLoop {
   *   private log = Logger.for(this);
   * }
   * ```
   */
  for(nameOrComponent: string | object): KernelLogger {
    const name =
      typeof nameOrComponent === "string" ? nameOrComponent : nameOrComponent.constructor.name;
    return boundLogger({ component: name });
  },

  get level(): LogLevel {
    return toLogLevel(rootLogger().level);
  },

  setLevel(level: LogLevel): void {
    rootLogger().level = level;
    generation++;
  },

  /** Drop the configuration and the root logger (mainly for tests). */
  reset(): void {
    config = {};
    root = null;
    generation++;
  },
};
