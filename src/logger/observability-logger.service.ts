// src/logger/observability-logger.service.ts

import { Inject, Injectable } from '@nestjs/common';
import pino, { Logger as PinoLogger, LoggerOptions } from 'pino';
import { DEFAULT_LOG_LEVEL, OBSERVABILITY_CONSTANTS } from '../config/constants';
import { ObservabilityConfig } from '../interfaces';
import { buildPayload, LogJsonLevel } from '../utils/formatters';
import { serializeError } from '../utils/serializers';

export interface LogJsonOptions {
  level?: LogJsonLevel;
  fields?: Record<string, unknown>;
}

@Injectable()
export class ObservabilityLoggerService {
  private readonly logger: PinoLogger;

  constructor(
    @Inject(OBSERVABILITY_CONSTANTS.MODULE_OPTIONS_TOKEN)
    private readonly config: ObservabilityConfig
  ) {
    this.logger = this.createLogger();
  }

  private createLogger(): PinoLogger {
    // Each line is the payload from buildPayload: no pid, hostname or pino
    // timestamp, and the level as its label rather than pino's number.
    const options: LoggerOptions = {
      level: this.config.LOG_LEVEL || process.env.LOG_LEVEL || DEFAULT_LOG_LEVEL,
      base: null,
      timestamp: false,
      formatters: {
        level: label => ({ level: label })
      }
    };

    if (this.config.logDestination) {
      return pino(options, this.config.logDestination);
    }

    if ((this.config.LOG_FORMAT || process.env.LOG_FORMAT) === 'pretty') {
      return pino({
        ...options,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            messageKey: 'detail',
            ignore: 'application_name',
            sync: false
          }
        }
      });
    }

    return pino(options, pino.destination({ dest: 1, sync: false }));
  }

  logJson(methodName: string, detail: string, { level = 'info', fields }: LogJsonOptions = {}): void {
    // pino writes `level` itself, ahead of the record.
    const { level: severity, ...record } = buildPayload(methodName, detail, {
      level,
      applicationName: this.config.SERVICE_NAME,
      fields
    });

    switch (severity) {
      case 'error':
        this.logger.error(record);
        break;
      case 'warn':
      case 'warning':
        this.logger.warn(record);
        break;
      case 'debug':
        this.logger.debug(record);
        break;
      default:
        this.logger.info(record);
    }
  }

  info(methodName: string, detail: string, fields?: Record<string, unknown>): void {
    this.logJson(methodName, detail, { level: 'info', fields });
  }

  /** Warning line carrying the serialized error, for failures that are not propagated. */
  warn(methodName: string, detail: string, error?: unknown): void {
    this.logJson(methodName, detail, {
      level: 'warn',
      fields: error === undefined ? undefined : { error: serializeError(error) }
    });
  }
}
