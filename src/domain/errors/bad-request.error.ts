import { DomainError } from './domain.error.js';

/**
 * The request payload could not be decoded into the expected shape
 */
export class BadRequestError extends DomainError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
    }
}
