import { DomainError } from './domain.error.js';

/**
 * Any persistence failure that is not a missing record. The detail is kept as
 * the cause for logging and never reaches the client.
 */
export class StoreError extends DomainError {
    constructor(operation: string, detail: Error) {
        super(`Store operation "${operation}" failed: ${detail.message}`, { cause: detail });
    }
}
