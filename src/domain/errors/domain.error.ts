/**
 * Base class for errors the HTTP layer knows how to translate
 */
export abstract class DomainError extends Error {
    protected constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}
