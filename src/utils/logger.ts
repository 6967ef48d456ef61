import winston from 'winston';
import { join } from 'path';
import { config, APP_NAME } from '../config/index.js';

const lineFormat = winston.format.printf(({ timestamp, level, message, ...meta }) => {
  const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${timestamp} [${level.toUpperCase()}] ${message}${metaStr}`;
});

export class Logger {
  private static instance: winston.Logger;

  static getInstance(): winston.Logger {
    if (!Logger.instance) {
      const transports: winston.transport[] = [
        new winston.transports.Console({
          format: winston.format.combine(
            winston.format.colorize(),
            winston.format.printf(({ timestamp, level, message, ...meta }) => {
              const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
              return `${timestamp} [${level}] ${message}${metaStr}`;
            })
          ),
        }),
      ];

      if (config.logging.file.enabled) {
        // Size-based rotation: media-scrobbler.log, media-scrobbler1.log, ...
        transports.push(
          new winston.transports.File({
            filename: join(config.logging.file.directory, `${APP_NAME}.log`),
            maxsize: config.logging.file.maxSize,
            maxFiles: config.logging.file.maxFiles,
            tailable: true,
            format: lineFormat,
          })
        );
      }

      Logger.instance = winston.createLogger({
        level: config.logging.level,
        format: winston.format.combine(
          winston.format.timestamp({
            format: 'YYYY-MM-DD HH:mm:ss',
          }),
          winston.format.errors({ stack: true })
        ),
        transports,
      });
    }

    return Logger.instance;
  }

  static info(message: string, meta?: Record<string, unknown>): void {
    Logger.getInstance().info(message, meta);
  }

  static warn(message: string, meta?: Record<string, unknown>): void {
    Logger.getInstance().warn(message, meta);
  }

  static error(message: string, meta?: Record<string, unknown>): void {
    Logger.getInstance().error(message, meta);
  }

  static debug(message: string, meta?: Record<string, unknown>): void {
    Logger.getInstance().debug(message, meta);
  }

  static setLevel(level: string): void {
    Logger.getInstance().level = level;
  }
}

/** Flattens an unknown thrown value into something loggable. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
