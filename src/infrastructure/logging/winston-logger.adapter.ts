import { Injectable, LoggerService, Scope } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs';
import * as path from 'path';
import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { ILoggerPort, LogContext, LogLevel } from '@application/ports/logger.port';
import { makeJsonFileFormat, makePrettyConsoleFormat } from './winston-logger.formatters';
import { deepRedact } from './utils/redaction.util';

@Injectable({ scope: Scope.DEFAULT })
export class WinstonLoggerAdapter implements ILoggerPort, LoggerService {
  private readonly logger: winston.Logger;
  private static isInitialized = false;

  constructor(private readonly configService: ConfigService) {
    const logLevel = this.configService.get<string>('LOG_LEVEL', 'info');
    const logDir = this.configService.get<string>('LOG_DIR', 'logs');
    const appName = this.configService.get<string>('APP_NAME', 'resume-scoring');
    const enableConsole = this.configService.get<string>('LOG_ENABLE_CONSOLE', 'true') === 'true';
    let enableFiles = this.configService.get<string>('LOG_ENABLE_FILES', 'false') === 'true';

    if (enableFiles) {
      try {
        const absDir = path.isAbsolute(logDir) ? logDir : path.join(process.cwd(), logDir);
        if (!fs.existsSync(absDir)) {
          fs.mkdirSync(absDir, { recursive: true });
        }
      } catch (e) {
        enableFiles = false;
        process.stderr.write(`Log directory ${logDir} unavailable, file logging disabled: ${String(e)}\n`);
      }
    }

    const consoleTransport = new winston.transports.Console({
      level: logLevel,
      format: makePrettyConsoleFormat(),
      silent: !enableConsole,
    });

    const jsonFormat = makeJsonFileFormat();

    const rotateFile = (filename: string, level?: string) =>
      new DailyRotateFile({
        dirname: logDir,
        filename: `${appName}-%DATE%-${filename}.log`,
        datePattern: 'YYYY-MM-DD',
        zippedArchive: true,
        maxSize: this.configService.get<string>('LOG_MAX_SIZE', '20m'),
        maxFiles: this.configService.get<string>('LOG_MAX_FILES', '14d'),
        level: level || logLevel,
        format: jsonFormat,
      });

    const fileTransports = enableFiles ? [rotateFile('combined'), rotateFile('error', 'error')] : [];
    const firstInstance = enableFiles && !WinstonLoggerAdapter.isInitialized;

    this.logger = winston.createLogger({
      level: logLevel,
      transports: [consoleTransport, ...fileTransports],
      exceptionHandlers: firstInstance ? [rotateFile('exceptions', 'error')] : [],
      rejectionHandlers: firstInstance ? [rotateFile('rejections', 'error')] : [],
      exitOnError: false,
    });

    if (firstInstance) WinstonLoggerAdapter.isInitialized = true;
  }

  private buildWinstonMeta(
    error?: unknown,
    context?: string | LogContext,
    metadata?: Record<string, unknown>,
  ): Record<string, unknown> {
    const meta: Record<string, unknown> = { ...metadata };

    if (typeof context === 'string') {
      meta.context = context;
    } else if (context) {
      try {
        meta.context = JSON.stringify(deepRedact(context));
      } catch {
        meta.context = '[Unserializable Context]';
      }
    }

    if (error instanceof Error) {
      meta.trace = error.stack;
      meta.error = { name: error.name, message: error.message, stack: error.stack };
    } else if (error !== undefined) {
      meta.error = error;
    }
    return meta;
  }

  log(message: string, context?: string | LogContext, metadata?: Record<string, unknown>): void {
    this.logger.info(message, this.buildWinstonMeta(undefined, context, metadata));
  }

  info(message: string, context?: string | LogContext, metadata?: Record<string, unknown>): void {
    this.logger.info(message, this.buildWinstonMeta(undefined, context, metadata));
  }

  debug(message: string, context?: string | LogContext, metadata?: Record<string, unknown>): void {
    this.logger.debug(message, this.buildWinstonMeta(undefined, context, metadata));
  }

  warn(message: string, context?: string | LogContext, metadata?: Record<string, unknown>): void {
    this.logger.warn(message, this.buildWinstonMeta(undefined, context, metadata));
  }

  error(
    message: string,
    error?: unknown,
    context?: string | LogContext,
    metadata?: Record<string, unknown>,
  ): void {
    this.logger.error(message, this.buildWinstonMeta(error, context, metadata));
  }

  fatal(
    message: string,
    error?: unknown,
    context?: string | LogContext,
    metadata?: Record<string, unknown>,
  ): void {
    this.logger.error(message, { ...this.buildWinstonMeta(error, context, metadata), fatal: true });
  }

  verbose(message: string, context?: string | LogContext, metadata?: Record<string, unknown>): void {
    this.logger.verbose(message, this.buildWinstonMeta(undefined, context, metadata));
  }

  setLevel(level: LogLevel): void {
    // winston has no "fatal" level; fatal entries are written at error
    this.logger.level = level === 'fatal' ? 'error' : level;
  }

  getLevel(): string {
    return this.logger.level;
  }
}
