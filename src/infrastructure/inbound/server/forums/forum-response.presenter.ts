// Domain
import { type Forum } from '../../../../domain/entities/forum.entity.js';

export type ForumResponse = {
    address: string;
    contact: string;
    email?: string;
    id: number;
    level: string;
    mode: string[];
    name: string;
    phone: string;
    version: number;
    website?: string;
};

export type ForumEnvelope = {
    forum: ForumResponse;
};

/**
 * Shapes a forum for the wire. `createdAt` is never exposed and empty
 * optional contact fields are left out.
 */
export class ForumResponsePresenter {
    location(forum: Forum): string {
        return `/forums/${forum.id}`;
    }

    present(forum: Forum): ForumEnvelope {
        return {
            forum: {
                id: forum.id,
                name: forum.name,
                level: forum.level,
                contact: forum.contact,
                phone: forum.phone,
                ...(forum.email !== '' && { email: forum.email }),
                ...(forum.website !== '' && { website: forum.website }),
                address: forum.address,
                mode: forum.mode ?? [],
                version: forum.version,
            },
        };
    }
}
