/**
 * Configuration loader and validator
 */
import dotenv from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Load environment variables
dotenv.config({ path: path.resolve(__dirname, '../../.env') });

/**
 * Application configuration
 */
export interface Config {
  server: {
    host: string;
    port: number;
    nodeEnv: string;
  };
  quality: {
    windowMs: number;
    snapshotIntervalMs: number;
    initialSessionId: string;
  };
  storage: {
    logsPath: string;
  };
  logging: {
    level: string;
    format: 'json' | 'simple';
    toFile: boolean;
    toConsole: boolean;
    moduleFilter?: string[];
  };
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    server: {
      host: env.HOST || '0.0.0.0',
      port: parseInt(env.PORT || '4100', 10),
      nodeEnv: env.NODE_ENV || 'development',
    },
    quality: {
      windowMs: parseInt(env.QUALITY_WINDOW_MS || '1000', 10),
      snapshotIntervalMs: parseInt(env.SNAPSHOT_INTERVAL_MS || '1000', 10),
      initialSessionId: env.INITIAL_SESSION_ID || 'aaaa',
    },
    storage: {
      logsPath: env.LOGS_PATH || './storage/logs',
    },
    logging: {
      level: env.LOG_LEVEL || 'info',
      format: env.LOG_FORMAT === 'json' ? 'json' : 'simple',
      toFile: env.LOG_TO_FILE !== 'false',
      toConsole: env.LOG_TO_CONSOLE !== 'false',
      moduleFilter: env.LOG_MODULE_FILTER
        ? env.LOG_MODULE_FILTER.split(',').map(m => m.trim()).filter(m => m.length > 0)
        : undefined,
    },
  };
}

/**
 * Validate configuration
 * @throws Error if configuration is invalid
 */
export function validateConfig(config: Config): void {
  const errors: string[] = [];

  if (!Number.isFinite(config.quality.windowMs) || config.quality.windowMs <= 0) {
    errors.push('QUALITY_WINDOW_MS must be positive');
  }

  if (!Number.isFinite(config.quality.snapshotIntervalMs) || config.quality.snapshotIntervalMs <= 0) {
    errors.push('SNAPSHOT_INTERVAL_MS must be positive');
  }

  if (!/^[a-z]{4}$/.test(config.quality.initialSessionId)) {
    errors.push('INITIAL_SESSION_ID must be 4 lowercase letters');
  }

  if (!(config.server.port > 0 && config.server.port <= 65535)) {
    errors.push('PORT must be between 1 and 65535');
  }

  if (errors.length > 0) {
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }
}

/**
 * Get validated configuration
 */
export function getConfig(): Config {
  const config = loadConfig();
  validateConfig(config);
  return config;
}
