import { z } from 'zod/v4';

export const LoggerLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

export type LoggerLevel = z.infer<typeof LoggerLevelSchema>;

export type LogContext = Record<string, unknown>;

/**
 * Structured logger used throughout the application
 */
export interface LoggerPort {
    debug(message: string, context?: LogContext): void;
    error(message: string, context?: LogContext): void;
    info(message: string, context?: LogContext): void;
    warn(message: string, context?: LogContext): void;
}
