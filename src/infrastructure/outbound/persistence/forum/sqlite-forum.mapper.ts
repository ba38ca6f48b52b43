import { z } from 'zod/v4';

// Domain
import { Forum, type ForumIdentity } from '../../../../domain/entities/forum.entity.js';

import { type SqlParameter } from '../../../../application/ports/outbound/persistence/database.port.js';

export interface ForumIdentityRow {
    created_at: string;
    id: number;
    version: number;
}

export interface ForumRow extends ForumIdentityRow {
    address: string;
    contact: string;
    email: string;
    level: string;
    mode: string;
    name: string;
    phone: string;
    website: string;
}

const modeColumnSchema = z.array(z.string());

export class ForumMapper {
    toDomain(row: ForumRow): Forum {
        return new Forum(
            {
                address: row.address,
                contact: row.contact,
                email: row.email,
                level: row.level,
                mode: modeColumnSchema.parse(JSON.parse(row.mode)),
                name: row.name,
                phone: row.phone,
                website: row.website,
            },
            this.toIdentity(row),
        );
    }

    toIdentity(row: ForumIdentityRow): ForumIdentity {
        return {
            createdAt: new Date(row.created_at),
            id: row.id,
            version: row.version,
        };
    }

    /**
     * Column values in the order name, level, contact, phone, email, website, address, mode
     */
    toParameters(forum: Forum): SqlParameter[] {
        return [
            forum.name,
            forum.level,
            forum.contact,
            forum.phone,
            forum.email,
            forum.website,
            forum.address,
            JSON.stringify(forum.mode),
        ];
    }
}
