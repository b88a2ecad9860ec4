import winston, { createLogger, transports } from 'winston';
import LokiTransport from 'winston-loki';
import { Inject, Injectable } from '@nestjs/common';
import type { LoggerService } from '../../types';

@Injectable()
export class CorpusLoggerService implements LoggerService {
  private readonly logger: winston.Logger;

  public constructor(
    @Inject('JOB_NAME') private readonly job: string,
    @Inject('APP_NAME') private readonly appName: string,
    @Inject('LOKI_HOST') private readonly lokiHost: string = '',
  ) {
    this.logger = this.createLogger(job, appName);
  }

  public get app(): string {
    return this.appName;
  }

  public log(message: string): void {
    this.logger.info(`ℹ️ [LOG] ${message}`);
  }

  public warn(message: string): void {
    this.logger.warn(`⚠️ [WARN] ${message}`);
  }

  public debug(message: string): void {
    if (process.env['NODE_ENV'] !== 'production')
      this.logger.debug(`🐛 [DEBUG] ${message}`);
  }

  public error(message: string, stack?: string): void {
    const logObject = {
      timestamp: new Date().toISOString(),
      level: 'error',
      job: this.job,
      message: `❌ [ERROR] ${message}`,
      stack: stack ? this.cleanStackTrace(stack) : undefined,
    };

    this.logger.error(JSON.stringify(logObject));
  }

  private createLogger(job: string, app: string): winston.Logger {
    return createLogger({
      level: 'debug',
      format: winston.format.json(),
      transports: this.initializeTransports(job, app),
    });
  }

  private initializeTransports(job: string, app: string): winston.transport[] {
    const transportsArray: winston.transport[] = [];

    if (this.lokiHost) {
      transportsArray.push(this.createLokiTransport(this.lokiHost, job, app));
    }

    // without a Loki sink the console is the only place logs can go
    if (!this.lokiHost || this.isDevelopmentEnvironment()) {
      transportsArray.push(this.createConsoleTransport());
    }

    return transportsArray;
  }

  private createLokiTransport(
    host: string,
    job: string,
    app: string,
  ): LokiTransport {
    return new LokiTransport({
      host,
      labels: { job, app },
      json: true,
      format: winston.format.json(),
      replaceTimestamp: true,
      onConnectionError: (err: unknown) =>
        console.error('Loki connection error:', err),
    });
  }

  private createConsoleTransport(): winston.transport {
    return new transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.simple(),
      ),
    });
  }

  private isDevelopmentEnvironment(): boolean {
    return ['dev', 'development'].includes(process.env['NODE_ENV'] || '');
  }

  private cleanStackTrace(stack: string, maxDepth: number = 4): string {
    const stackLines = stack
      .trim()
      .split('\n')
      .map((line) => line.trim())
      .filter(
        (line) =>
          line.startsWith('Error:') || !line.includes('internal/modules'),
      )
      .map((line) => {
        if (!line.startsWith('at')) return line;

        const match = line.match(/\((.+)\)/);
        if (!match) return line;

        const location = match[1];
        const simplified = location.includes('node_modules')
          ? location.slice(location.lastIndexOf('node_modules/') + 'node_modules/'.length)
          : location.split('/').slice(-3).join('/');
        return `(${simplified})`;
      });

    return stackLines.slice(0, maxDepth).join('\n    ');
  }
}
