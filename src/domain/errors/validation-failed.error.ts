import { type ValidationErrors } from '../validator/validator.js';

import { DomainError } from './domain.error.js';

export class ValidationFailedError extends DomainError {
    constructor(public readonly errors: ValidationErrors) {
        super(`Validation failed for: ${Object.keys(errors).join(', ')}`);
    }
}
