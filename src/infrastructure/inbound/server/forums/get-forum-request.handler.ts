// Domain
import { RecordNotFoundError } from '../../../../domain/errors/record-not-found.error.js';

const ID_PATTERN = /^\d+$/;

/**
 * Parses the `:id` path segment of GET /forums/:id
 */
export class GetForumRequestHandler {
    /**
     * @throws RecordNotFoundError when the segment is not a decimal integer
     */
    handle(rawId: string): number {
        const id = ID_PATTERN.test(rawId) ? Number(rawId) : Number.NaN;

        if (!Number.isSafeInteger(id)) {
            throw new RecordNotFoundError('Forum', rawId);
        }

        return id;
    }
}
