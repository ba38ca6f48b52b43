import pino, { type Logger } from 'pino';

// Application
import {
    type LogContext,
    type LoggerLevel,
    type LoggerPort,
} from '../../../application/ports/outbound/logging/logger.port.js';

export interface PinoLoggerOptions {
    level: LoggerLevel;
    prettyPrint: boolean;
}

/**
 * LoggerPort adapter on top of pino. Context objects become structured fields;
 * `error` values are serialized through pino's err serializer.
 */
export class PinoLogger implements LoggerPort {
    private readonly logger: Logger;

    constructor(options: PinoLoggerOptions) {
        this.logger = pino({
            level: options.level,
            serializers: { error: pino.stdSerializers.err },
            timestamp: pino.stdTimeFunctions.isoTime,
            ...(options.prettyPrint
                ? {
                      transport: {
                          options: { colorize: true, translateTime: 'SYS:standard' },
                          target: 'pino-pretty',
                      },
                  }
                : {}),
        });
    }

    debug(message: string, context?: LogContext): void {
        this.logger.debug(context ?? {}, message);
    }

    error(message: string, context?: LogContext): void {
        this.logger.error(context ?? {}, message);
    }

    info(message: string, context?: LogContext): void {
        this.logger.info(context ?? {}, message);
    }

    warn(message: string, context?: LogContext): void {
        this.logger.warn(context ?? {}, message);
    }
}
