import winston from 'winston';
import { existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import type { LogFormat, LoggingConfig } from '../config/schema.js';
import { IrqTopError } from '../errors/index.js';

/**
 * Winston-backed logger.
 * Console output goes to stderr; stdout belongs to the table.
 */

const SIZE_UNITS: Record<string, number> = {
  b: 1,
  k: 1024,
  m: 1024 * 1024,
  g: 1024 * 1024 * 1024,
};

/**
 * Bytes for a size such as `10m`. Sizes are validated by the config schema.
 */
export function parseLogSize(size: string): number {
  const match = /^(\d+)([bkmg])$/.exec(size.toLowerCase());
  if (!match?.[1] || !match[2]) {
    return 10 * 1024 * 1024;
  }
  return parseInt(match[1], 10) * (SIZE_UNITS[match[2]] ?? 1);
}

function lineFormat(withMetadata: boolean): winston.Logform.Format {
  return winston.format.printf(({ timestamp, level, message, ...metadata }) => {
    const line = `${String(timestamp)} [${level}]: ${String(message)}`;
    return withMetadata && Object.keys(metadata).length > 0 ? `${line} ${JSON.stringify(metadata)}` : line;
  });
}

function formatFor(format: LogFormat): winston.Logform.Format {
  const common = [winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }), winston.format.errors({ stack: true })];

  switch (format) {
    case 'json':
      return winston.format.combine(...common, winston.format.json());
    case 'pretty':
      return winston.format.combine(...common, winston.format.colorize(), lineFormat(true));
    case 'simple':
      return winston.format.combine(...common, lineFormat(false));
  }
}

export class Logger {
  private logger: winston.Logger;
  private readonly config: LoggingConfig;

  constructor(config: LoggingConfig) {
    this.config = config;

    const transports = this.buildTransports();
    this.logger = winston.createLogger({
      level: config.level,
      format: formatFor(config.format),
      transports,
      // winston warns on writes with no transports
      silent: transports.length === 0,
      exitOnError: false,
    });
  }

  private buildTransports(): winston.transport[] {
    const { console, dir, maxFiles, maxSize } = this.config;
    const transports: winston.transport[] = [];

    if (console) {
      transports.push(new winston.transports.Console({ stderrLevels: ['debug', 'info', 'warn', 'error'] }));
    }

    if (dir) {
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
      const rotation = { maxsize: parseLogSize(maxSize), maxFiles };
      transports.push(
        new winston.transports.File({ filename: join(dir, 'numa-irq-top.log'), ...rotation }),
        new winston.transports.File({ filename: join(dir, 'numa-irq-top-error.log'), level: 'error', ...rotation })
      );
    }

    return transports;
  }

  debug(message: string, metadata?: object): void {
    this.logger.debug(message, metadata);
  }

  info(message: string, metadata?: object): void {
    this.logger.info(message, metadata);
  }

  warn(message: string, metadata?: object): void {
    this.logger.warn(message, metadata);
  }

  /**
   * Log an error; IrqTopError code and severity go into the metadata
   */
  error(message: string, error?: Error, metadata?: object): void {
    if (!error) {
      this.logger.error(message, metadata);
      return;
    }

    const details = error instanceof IrqTopError ? { code: error.code, severity: error.severity } : {};
    this.logger.error(message, {
      error: { message: error.message, stack: error.stack, ...details },
      ...metadata,
    });
  }

  /**
   * Logger sharing this one's transports, tagging every entry with `metadata`
   */
  child(metadata: object): Logger {
    const childLogger = new Logger({ ...this.config, console: false, dir: undefined });
    childLogger.logger = this.logger.child(metadata);
    return childLogger;
  }

  /** Underlying winston logger, for attaching transports */
  get winston(): winston.Logger {
    return this.logger;
  }
}

let loggerInstance: Logger | null = null;

export function getLogger(config?: LoggingConfig): Logger {
  if (!loggerInstance && config) {
    loggerInstance = new Logger(config);
  } else if (!loggerInstance) {
    throw new Error('Logger not initialized. Call getLogger with config first.');
  }
  return loggerInstance;
}

export function resetLogger(): void {
  loggerInstance = null;
}
