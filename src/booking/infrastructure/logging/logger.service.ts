import { Injectable } from '@nestjs/common';
import pino, { Logger } from 'pino';

@Injectable()
export class LoggerService {
  private logger: Logger;

  constructor() {
    const nodeEnv = process.env.NODE_ENV;
    this.logger = pino({
      level: process.env.LOG_LEVEL || 'info',
      transport:
        nodeEnv !== 'production' && nodeEnv !== 'test'
          ? {
              target: 'pino-pretty',
              options: {
                colorize: true,
              },
            }
          : undefined,
    });
  }

  log(context: {
    requestId?: string;
    restaurantId?: string;
    partySize?: number;
    op: string;
    durationMs?: number;
    outcome: string;
    [key: string]: unknown;
  }): void {
    this.logger.info(context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.logger.error({ err: error, ...context }, message);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.logger.warn(context, message);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.logger.debug(context, message);
  }
}
