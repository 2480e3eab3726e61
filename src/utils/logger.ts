/**
 * Winston logger configuration
 */
import winston from 'winston';
import path from 'path';
import fs from 'fs-extra';

const { combine, timestamp, printf, colorize, json, errors } = winston.format;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Logger options (mirrors the `logging` config section plus the logs directory)
 */
export interface LoggerOptions {
  level: string;
  format: 'json' | 'simple';
  toFile: boolean;
  toConsole: boolean;
  logsPath: string;
  moduleFilter?: string[];
}

/**
 * Allowed modules for logging (populated from config)
 */
let allowedModules: Set<string> | null = null;

/**
 * Safe JSON stringify that handles circular references, buffers and errors
 */
function safeStringify(obj: unknown, indent: number = 2): string {
  const seen = new WeakSet<object>();

  return JSON.stringify(obj, (_key, value: unknown) => {
    if (value === null || value === undefined) {
      return value;
    }

    if (value instanceof Error) {
      const errorObj: Record<string, unknown> = {
        name: value.name,
        message: value.message,
        stack: value.stack,
      };
      if ('code' in value) {
        errorObj.code = value.code;
      }
      if (value.cause) {
        errorObj.cause = value.cause;
      }
      return errorObj;
    }

    // Audio payloads would flood the log
    if (Buffer.isBuffer(value)) {
      return `<Buffer ${value.length} bytes>`;
    }

    if (typeof value === 'object') {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }

    return value;
  }, indent);
}

/**
 * Filter logs by module context
 */
const moduleFilter = winston.format((info) => {
  if (!allowedModules || allowedModules.size === 0) {
    return info;
  }

  if (typeof info.context === 'string' && !allowedModules.has(info.context)) {
    return false;
  }

  return info;
});

/**
 * Console line format
 */
const consoleFormat = printf(({ level, message, timestamp, context, ...meta }) => {
  const contextStr = context ? `[${String(context)}]` : '';
  const metaStr = Object.keys(meta).length ? safeStringify(meta, 2) : '';
  return `${String(timestamp)} [${level}]${contextStr}: ${String(message)} ${metaStr}`;
});

/**
 * Create logger instance
 */
export function createLogger(options: LoggerOptions): winston.Logger {
  const transports: winston.transport[] = [];

  if (options.moduleFilter && options.moduleFilter.length > 0) {
    allowedModules = new Set(options.moduleFilter);
  } else {
    allowedModules = null;
  }

  if (options.toConsole) {
    transports.push(
      new winston.transports.Console({
        format: combine(
          moduleFilter(),
          colorize(),
          timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
          errors({ stack: true }),
          consoleFormat
        ),
      })
    );
  }

  if (options.toFile) {
    fs.ensureDirSync(options.logsPath);

    transports.push(
      new winston.transports.File({
        filename: path.join(options.logsPath, 'error.log'),
        level: 'error',
        format: combine(
          moduleFilter(),
          timestamp(),
          errors({ stack: true }),
          json()
        ),
      })
    );

    transports.push(
      new winston.transports.File({
        filename: path.join(options.logsPath, 'combined.log'),
        format: combine(
          moduleFilter(),
          timestamp(),
          errors({ stack: true }),
          options.format === 'json' ? json() : consoleFormat
        ),
      })
    );
  }

  return winston.createLogger({
    level: options.level,
    transports,
    // No transports (tests) means nothing to write to
    silent: transports.length === 0,
    exitOnError: false,
  });
}

let loggerInstance: winston.Logger | null = null;

/**
 * Initialize the default logger
 */
export function initLogger(options: LoggerOptions): void {
  loggerInstance = createLogger(options);

  if (options.moduleFilter && options.moduleFilter.length > 0) {
    loggerInstance.info(`Log filtering enabled for modules: ${options.moduleFilter.join(', ')}`);
  } else {
    loggerInstance.debug('Log filtering disabled - showing all modules');
  }
}

/**
 * Get the logger instance
 * @throws Error if logger not initialized
 */
export function getLogger(): winston.Logger {
  if (!loggerInstance) {
    throw new Error('Logger not initialized. Call initLogger() first.');
  }
  return loggerInstance;
}

/**
 * Create a child logger with context
 */
export function createChildLogger(context: string): winston.Logger {
  return getLogger().child({ context });
}

/**
 * Module-level log function bound to a context.
 *
 * The child logger is created lazily on first use, so modules can be imported
 * before `initLogger()` runs; messages logged before that are dropped.
 */
export function contextLogger(context: string): (level: LogLevel, message: string, ...args: unknown[]) => void {
  let child: winston.Logger | null = null;
  let owner: winston.Logger | null = null;

  return (level, message, ...args) => {
    if (!loggerInstance) {
      return;
    }
    if (!child || owner !== loggerInstance) {
      owner = loggerInstance;
      child = loggerInstance.child({ context });
    }
    child[level](message, ...args);
  };
}
