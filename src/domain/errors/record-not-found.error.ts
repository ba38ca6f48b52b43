import { DomainError } from './domain.error.js';

export class RecordNotFoundError extends DomainError {
    constructor(resource: string, id?: number | string) {
        super(id === undefined ? `${resource} not found` : `${resource} ${id} not found`);
    }
}
