import winston from 'winston';
import path from 'path';
import fs from 'fs';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export class LoggerService {
  private logger: winston.Logger;

  constructor() {
    const logPath = process.env.LOG_PATH ?? 'service_monitor.log';
    const logToFile = process.env.LOG_TO_FILE !== 'false';
    const silent = process.env.LOG_SILENT === 'true';

    this.logger = winston.createLogger({
      level: parseLogLevel(process.env.LOG_LEVEL),
      silent,
      format: winston.format.combine(
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      transports: [
        new winston.transports.Console({
          format: winston.format.combine(
            winston.format.colorize(),
            winston.format.simple()
          ),
        }),
      ],
    });

    if (logToFile) {
      // Ensure log directory exists
      const logDir = path.dirname(logPath);
      if (!fs.existsSync(logDir)) {
        fs.mkdirSync(logDir, { recursive: true });
      }

      this.logger.add(
        new winston.transports.File({
          filename: logPath,
          maxsize: 5242880, // 5MB
          maxFiles: 5,
        })
      );
    }
  }

  setLevel(level: LogLevel): void {
    this.logger.level = level;
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta);
  }
}

function parseLogLevel(raw: string | undefined): LogLevel {
  switch (raw?.trim().toLowerCase()) {
    case 'error':
      return 'error';
    case 'warn':
      return 'warn';
    case 'debug':
      return 'debug';
    default:
      return 'info';
  }
}

export const logger = new LoggerService();
