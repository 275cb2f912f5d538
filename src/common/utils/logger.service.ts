import { LoggerService } from '@nestjs/common';
import { createLogger, format, Logger, transports } from 'winston';

export interface LoggerOptions {
  level?: string;
  file?: string;
}

export class CustomLogger implements LoggerService {
  private readonly logger: Logger;

  constructor(options: LoggerOptions = {}) {
    const consoleTransport = new transports.Console({
      format: format.combine(
        format.colorize(),
        format.printf(({ level, message, context }) =>
          context ? `${level} [${context}] ${message}` : `${level} ${message}`,
        ),
      ),
    });

    this.logger = createLogger({
      level: options.level ?? process.env.LOG_LEVEL ?? 'info',
      format: format.combine(
        format.timestamp(),
        format.json(),
      ),
      transports: options.file
        ? [consoleTransport, new transports.File({ filename: options.file })]
        : [consoleTransport],
    });
  }

  log(message: string, context?: string) {
    this.logger.info(message, { context });
  }

  error(message: string, trace?: string, context?: string) {
    this.logger.error(message, { trace, context });
  }

  warn(message: string, context?: string) {
    this.logger.warn(message, { context });
  }

  debug(message: string, context?: string) {
    this.logger.debug(message, { context });
  }

  verbose(message: string, context?: string) {
    this.logger.verbose(message, { context });
  }
}
