import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';

// Application
import { type LoggerPort } from '../../../application/ports/outbound/logging/logger.port.js';

// Domain
import { BadRequestError } from '../../../domain/errors/bad-request.error.js';
import { RecordNotFoundError } from '../../../domain/errors/record-not-found.error.js';
import { ValidationFailedError } from '../../../domain/errors/validation-failed.error.js';

export const NOT_FOUND_MESSAGE = 'the requested resource could not be found';
export const SERVER_ERROR_MESSAGE =
    'the server encountered a problem and could not process your request';

/**
 * Creates a global error handling middleware for Hono
 * Maps domain errors to their HTTP status; anything unrecognised is a 500 whose detail stays in the logs
 */
export const createErrorHandlerMiddleware = (logger: LoggerPort) => {
    return async (err: Error, c: Context) => {
        if (err instanceof ValidationFailedError) {
            logger.debug('Request failed validation', { errors: err.errors, path: c.req.path });
            return c.json({ error: err.errors }, 400);
        }

        if (err instanceof BadRequestError) {
            logger.debug('Bad request', { error: err.message, path: c.req.path });
            return c.json({ error: err.message }, 400);
        }

        if (err instanceof RecordNotFoundError) {
            logger.debug('Record not found', { error: err.message, path: c.req.path });
            return c.json({ error: NOT_FOUND_MESSAGE }, 404);
        }

        if (err instanceof HTTPException) {
            return c.json({ error: err.message }, err.status);
        }

        logger.error('Unexpected error in HTTP handler', {
            cause: err.cause,
            error: err.message,
            method: c.req.method,
            path: c.req.path,
            stack: err.stack,
        });

        return c.json({ error: SERVER_ERROR_MESSAGE }, 500);
    };
};

export const notFoundHandler = (c: Context) => c.json({ error: NOT_FOUND_MESSAGE }, 404);
