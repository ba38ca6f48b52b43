import { type Forum } from '../../../../domain/entities/forum.entity.js';

import { type StoreResult } from './store-result.js';

/**
 * Forum repository port - defines how forums are persisted and retrieved
 */
export interface ForumRepositoryPort {
    /**
     * Remove the forum with the given id; `not-found` when nothing was removed
     */
    delete(id: number): Promise<StoreResult<void>>;

    /**
     * Fetch a forum; ids below 1 are `not-found` without a store round trip
     */
    get(id: number): Promise<StoreResult<Forum>>;

    /**
     * Persist a new forum and write the assigned id, creation time and version back into it
     */
    insert(forum: Forum): Promise<StoreResult<Forum>>;

    /**
     * Overwrite the forum's details and bump its version by one in a single statement.
     * Yields `edit-conflict` when the stored version no longer matches `forum.version`.
     * Inserts and updates of a forum that fails validation yield `store-error` and write nothing.
     */
    update(forum: Forum): Promise<StoreResult<Forum>>;
}
