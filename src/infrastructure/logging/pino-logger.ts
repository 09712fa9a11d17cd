import pino from 'pino';
import type { Logger, LogContext } from '../../application/ports/driven/logger-port.js';
import { sanitizeForLogs } from '../../domain/helpers/log-sanitizer.js';

export class PinoLogger implements Logger {
  private logger: pino.Logger;

  constructor(level: string = 'info', serviceName: string = 'user-management-api', pretty: boolean = false) {
    this.logger = pino({
      level,
      name: serviceName,
      transport: pretty ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      } : undefined,
      serializers: {
        err: pino.stdSerializers.err,
      },
    });
  }

  info(context: LogContext, message: string): void {
    this.logger.info(sanitizeForLogs(context), message);
  }

  error(context: LogContext, message: string): void {
    this.logger.error(sanitizeForLogs(context), message);
  }

  warn(context: LogContext, message: string): void {
    this.logger.warn(sanitizeForLogs(context), message);
  }

  debug(context: LogContext, message: string): void {
    this.logger.debug(sanitizeForLogs(context), message);
  }
}
