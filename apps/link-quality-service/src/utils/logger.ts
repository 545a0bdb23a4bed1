/**
 * Winston logger configuration
 */
import winston from 'winston';
import path from 'path';
import fs from 'fs-extra';

const { combine, timestamp, printf, colorize, json, errors } = winston.format;

/**
 * Logger options (mirrors Config.logging plus the logs directory)
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
 * Safe JSON stringify that handles circular references and errors
 */
function safeStringify(obj: unknown, indent: number = 2): string {
  const seen = new WeakSet<object>();

  return JSON.stringify(obj, (_key, value: unknown) => {
    if (value instanceof Error) {
      const errorObj: Record<string, unknown> = {
        name: value.name,
        message: value.message,
        stack: value.stack,
      };
      if (value.cause) {
        errorObj.cause = value.cause;
      }
      return errorObj;
    }

    if (typeof value === 'object' && value !== null) {
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

  // Root logger has no context
  return info;
});

/**
 * Custom log format for console output
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
        filename: path.join(options.logsPath, 'link-quality.log'),
        format: combine(
          moduleFilter(),
          timestamp(),
          errors({ stack: true }),
          options.format === 'json' ? json() : consoleFormat
        ),
      })
    );
  }

  // Winston warns when a logger has no transports
  if (transports.length === 0) {
    transports.push(new winston.transports.Console({ silent: true }));
  }

  return winston.createLogger({
    level: options.level,
    transports,
    exitOnError: false,
  });
}

/**
 * Default logger instance (initialized in main.ts)
 */
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
