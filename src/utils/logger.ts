/**
 * Structured Logging Utility
 *
 * Pino-style API: `logger.info(msg, context)` or `logger.info(context, msg)`.
 * JSON lines in production, colored single lines elsewhere.
 *
 * Usage:
 *   import { logger } from '@/utils/logger';
 *   logger.info('Catalog refreshed', { markets: 100 });
 *
 *   const log = logger.child({ service: 'CatalogCache' });
 *   log.warn('Serving stale catalog');
 */

// ============================================================================
// Types
// ============================================================================

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/** Numeric log level values (pino-compatible) */
export const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

export interface LogContext {
  /** Service or component name */
  service?: string;
  [key: string]: unknown;
}

export interface LogEntry {
  time: string;
  level: LogLevel;
  levelNum: number;
  msg: string;
  [key: string]: unknown;
}

export interface LoggerConfig {
  level: LogLevel;
  name?: string;
  prettyPrint: boolean;
  base?: LogContext;
}

export interface Logger {
  level: LogLevel;
  trace(msg: string, context?: LogContext): void;
  trace(context: LogContext, msg: string): void;
  debug(msg: string, context?: LogContext): void;
  debug(context: LogContext, msg: string): void;
  info(msg: string, context?: LogContext): void;
  info(context: LogContext, msg: string): void;
  warn(msg: string, context?: LogContext): void;
  warn(context: LogContext, msg: string): void;
  error(msg: string, context?: LogContext): void;
  error(context: LogContext, msg: string): void;
  fatal(msg: string, context?: LogContext): void;
  fatal(context: LogContext, msg: string): void;
  child(bindings: LogContext): Logger;
}

// ============================================================================
// Configuration
// ============================================================================

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Get log level from LOG_LEVEL, falling back on NODE_ENV
 */
function getLogLevelFromEnv(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level && isLogLevel(level)) {
    return level;
  }
  if (process.env.NODE_ENV === "test") {
    return "warn";
  }
  return process.env.NODE_ENV === "production" ? "info" : "debug";
}

function shouldPrettyPrint(): boolean {
  if (process.env.LOG_PRETTY === "false") {
    return false;
  }
  return process.env.NODE_ENV !== "production";
}

// ============================================================================
// Pretty printing
// ============================================================================

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: COLORS.gray,
  debug: COLORS.cyan,
  info: COLORS.green,
  warn: COLORS.yellow,
  error: COLORS.red,
  fatal: COLORS.red + COLORS.bold,
};

const RESERVED_KEYS = new Set(["time", "level", "levelNum", "msg", "service"]);

function formatPretty(entry: LogEntry): string {
  const clock = entry.time.split("T")[1]?.replace("Z", "") ?? entry.time;
  const level = LEVEL_COLORS[entry.level] + entry.level.toUpperCase().padEnd(5) + COLORS.reset;
  const name =
    typeof entry.service === "string" ? `${COLORS.cyan}[${entry.service}]${COLORS.reset} ` : "";

  const context: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(entry)) {
    if (!RESERVED_KEYS.has(key)) {
      context[key] = value;
    }
  }

  const contextStr =
    Object.keys(context).length > 0
      ? ` ${COLORS.dim}${JSON.stringify(context)}${COLORS.reset}`
      : "";

  return `${COLORS.dim}${clock}${COLORS.reset} ${level} ${name}${entry.msg}${contextStr}`;
}

// ============================================================================
// Logger Implementation
// ============================================================================

/**
 * Accept both (msg, context) and (context, msg)
 */
function parseArgs(
  arg1: string | LogContext,
  arg2?: string | LogContext
): { msg: string; context: LogContext } {
  if (typeof arg1 === "string") {
    return { msg: arg1, context: typeof arg2 === "object" ? arg2 : {} };
  }
  return { msg: typeof arg2 === "string" ? arg2 : "", context: arg1 };
}

function createLogger(config: Partial<LoggerConfig> = {}): Logger {
  const fullConfig: LoggerConfig = {
    level: config.level ?? getLogLevelFromEnv(),
    name: config.name,
    prettyPrint: config.prettyPrint ?? shouldPrettyPrint(),
    base: config.base ?? {},
  };

  const threshold = LOG_LEVELS[fullConfig.level];

  function output(level: LogLevel, msg: string, context: LogContext): void {
    if (LOG_LEVELS[level] < threshold) {
      return;
    }

    const entry: LogEntry = {
      time: new Date().toISOString(),
      level,
      levelNum: LOG_LEVELS[level],
      msg,
      ...fullConfig.base,
      ...context,
    };

    if (fullConfig.name) {
      entry.service = fullConfig.name;
    }

    const formatted = fullConfig.prettyPrint ? formatPretty(entry) : JSON.stringify(entry);

    switch (level) {
      case "trace":
      case "debug":
        // eslint-disable-next-line no-console
        console.debug(formatted);
        break;
      case "info":
        // eslint-disable-next-line no-console
        console.info(formatted);
        break;
      case "warn":
        // eslint-disable-next-line no-console
        console.warn(formatted);
        break;
      case "error":
      case "fatal":
        // eslint-disable-next-line no-console
        console.error(formatted);
        break;
    }
  }

  function method(level: LogLevel) {
    return (arg1: string | LogContext, arg2?: string | LogContext): void => {
      const { msg, context } = parseArgs(arg1, arg2);
      output(level, msg, context);
    };
  }

  return {
    level: fullConfig.level,
    trace: method("trace"),
    debug: method("debug"),
    info: method("info"),
    warn: method("warn"),
    error: method("error"),
    fatal: method("fatal"),
    child(bindings: LogContext): Logger {
      return createLogger({
        ...fullConfig,
        name: bindings.service ?? fullConfig.name,
        base: { ...fullConfig.base, ...bindings },
      });
    },
  };
}

// ============================================================================
// Shared instances
// ============================================================================

export const logger = createLogger({
  name: "market-discovery",
});

export function createServiceLogger(serviceName: string): Logger {
  return logger.child({ service: serviceName });
}

let _fetcherLogger: Logger | null = null;
let _cacheLogger: Logger | null = null;
let _searchLogger: Logger | null = null;

/** Lazily created loggers for the pipeline's components */
export const serviceLoggers = {
  get catalogFetcher(): Logger {
    if (!_fetcherLogger) {
      _fetcherLogger = createServiceLogger("CatalogFetcher");
    }
    return _fetcherLogger;
  },

  get catalogCache(): Logger {
    if (!_cacheLogger) {
      _cacheLogger = createServiceLogger("CatalogCache");
    }
    return _cacheLogger;
  },

  get marketSearch(): Logger {
    if (!_searchLogger) {
      _searchLogger = createServiceLogger("MarketSearch");
    }
    return _searchLogger;
  },
};

export { createLogger, getLogLevelFromEnv, shouldPrettyPrint };

export default logger;
