// Application
import { type DatabasePort } from '../../../../application/ports/outbound/persistence/database.port.js';
import { type ForumRepositoryPort } from '../../../../application/ports/outbound/persistence/forum-repository.port.js';
import {
    editConflict,
    mapStoreResult,
    notFound,
    ok,
    storeError,
    type StoreResult,
} from '../../../../application/ports/outbound/persistence/store-result.js';

// Domain
import { type Forum, validateForum } from '../../../../domain/entities/forum.entity.js';
import { ValidationFailedError } from '../../../../domain/errors/validation-failed.error.js';
import { Validator } from '../../../../domain/validator/validator.js';

import { type ForumIdentityRow, ForumMapper, type ForumRow } from './sqlite-forum.mapper.js';

const INSERT_FORUM = `
    INSERT INTO forums (name, level, contact, phone, email, website, address, mode)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    RETURNING id, created_at, version
`;

const SELECT_FORUM = `
    SELECT id, created_at, name, level, contact, phone, email, website, address, mode, version
    FROM forums
    WHERE id = ?
`;

const UPDATE_FORUM = `
    UPDATE forums
    SET name = ?, level = ?, contact = ?, phone = ?, email = ?, website = ?, address = ?, mode = ?,
        version = version + 1
    WHERE id = ? AND version = ?
    RETURNING version
`;

const FORUM_EXISTS = `SELECT id FROM forums WHERE id = ?`;

const DELETE_FORUM = `DELETE FROM forums WHERE id = ?`;

const isValidId = (id: number): boolean => Number.isSafeInteger(id) && id >= 1;

/**
 * Writes refuse forums that break a validation rule; the failure carries the field errors
 */
const rejectInvalid = (forum: Forum): StoreResult<Forum> | undefined => {
    const validator = new Validator();
    validateForum(validator, forum);

    return validator.valid() ? undefined : storeError(new ValidationFailedError(validator.errors));
};

export class SqliteForumRepository implements ForumRepositoryPort {
    private readonly mapper: ForumMapper;

    constructor(private readonly database: DatabasePort) {
        this.mapper = new ForumMapper();
    }

    async delete(id: number): Promise<StoreResult<void>> {
        if (!isValidId(id)) return notFound();

        const result = await this.database.execute(DELETE_FORUM, [id]);
        if (result.status !== 'ok') return mapStoreResult(result, () => undefined);

        return result.value.changes === 0 ? notFound() : ok(undefined);
    }

    async get(id: number): Promise<StoreResult<Forum>> {
        if (!isValidId(id)) return notFound();

        const result = await this.database.queryOne<ForumRow>(SELECT_FORUM, [id]);
        return mapStoreResult(result, (row) => this.mapper.toDomain(row));
    }

    async insert(forum: Forum): Promise<StoreResult<Forum>> {
        const rejected = rejectInvalid(forum);
        if (rejected) return rejected;

        const result = await this.database.queryOne<ForumIdentityRow>(
            INSERT_FORUM,
            this.mapper.toParameters(forum),
        );

        if (result.status === 'not-found') {
            return storeError(new Error('Insert into forums returned no row'));
        }

        return mapStoreResult(result, (row) => {
            forum.assignIdentity(this.mapper.toIdentity(row));
            return forum;
        });
    }

    async update(forum: Forum): Promise<StoreResult<Forum>> {
        if (!forum.isPersisted()) return notFound();

        const rejected = rejectInvalid(forum);
        if (rejected) return rejected;

        const result = await this.database.queryOne<Pick<ForumIdentityRow, 'version'>>(
            UPDATE_FORUM,
            [...this.mapper.toParameters(forum), forum.id, forum.version],
        );

        if (result.status === 'not-found') {
            // Nothing matched id and version together: tell a missing row from a stale version
            const existing = await this.database.queryOne<Pick<ForumIdentityRow, 'id'>>(
                FORUM_EXISTS,
                [forum.id],
            );
            return existing.status === 'ok' ? editConflict() : mapStoreResult(existing, () => forum);
        }

        return mapStoreResult(result, (row) => {
            forum.version = row.version;
            return forum;
        });
    }
}
