import {
    byteLength,
    isEmail,
    isWebsite,
    matches,
    PHONE_RX,
    unique,
    type Validator,
} from '../validator/validator.js';

export const MAX_TEXT_BYTES = 200;
export const MAX_ADDRESS_BYTES = 500;
export const MIN_MODE_ENTRIES = 1;
export const MAX_MODE_ENTRIES = 5;

/**
 * Client-supplied part of a forum
 */
export interface ForumDetails {
    address: string;
    contact: string;
    email: string;
    level: string;
    /** `null` when the client omitted it */
    mode: null | string[];
    name: string;
    phone: string;
    website: string;
}

/**
 * Values the store assigns on insert
 */
export interface ForumIdentity {
    createdAt: Date;
    id: number;
    version: number;
}

/**
 * @description A forum listing. Identity fields stay unset (zero) until the
 * store writes them back after an insert.
 */
export class Forum implements ForumDetails, ForumIdentity {
    public address: string;
    public contact: string;
    public createdAt: Date = new Date(0);
    public email: string;
    public id = 0;
    public level: string;
    public mode: null | string[];
    public name: string;
    public phone: string;
    public version = 0;
    public website: string;

    public constructor(details: ForumDetails, identity?: ForumIdentity) {
        this.name = details.name;
        this.level = details.level;
        this.contact = details.contact;
        this.phone = details.phone;
        this.email = details.email;
        this.website = details.website;
        this.address = details.address;
        this.mode = details.mode;

        if (identity) {
            this.assignIdentity(identity);
        }
    }

    public assignIdentity(identity: ForumIdentity): void {
        this.id = identity.id;
        this.createdAt = identity.createdAt;
        this.version = identity.version;
    }

    public isPersisted(): boolean {
        return this.id > 0;
    }
}

/**
 * Runs every forum rule against the candidate. Checks never short-circuit;
 * the validator keeps the first failure per field.
 */
export const validateForum = (v: Validator, forum: ForumDetails): void => {
    v.check(forum.name !== '', 'name', 'must be provided');
    v.check(byteLength(forum.name) <= MAX_TEXT_BYTES, 'name', 'must not be more than 200 bytes long');

    v.check(forum.level !== '', 'level', 'must be provided');
    v.check(
        byteLength(forum.level) <= MAX_TEXT_BYTES,
        'level',
        'must not be more than 200 bytes long',
    );

    v.check(forum.contact !== '', 'contact', 'must be provided');
    v.check(
        byteLength(forum.contact) <= MAX_TEXT_BYTES,
        'contact',
        'must not be more than 200 bytes long',
    );

    v.check(forum.phone !== '', 'phone', 'must be provided');
    v.check(matches(forum.phone, PHONE_RX), 'phone', 'must be a valid phone number');

    v.check(forum.email !== '', 'email', 'must be provided');
    v.check(isEmail(forum.email), 'email', 'must be a valid email address');

    v.check(forum.website !== '', 'website', 'must be provided');
    v.check(isWebsite(forum.website), 'website', 'must be a valid URL');

    v.check(forum.address !== '', 'address', 'must be provided');
    v.check(
        byteLength(forum.address) <= MAX_ADDRESS_BYTES,
        'address',
        'must not be more than 500 bytes long',
    );

    const mode = forum.mode ?? [];
    v.check(forum.mode !== null, 'mode', 'must be provided');
    v.check(mode.length >= MIN_MODE_ENTRIES, 'mode', 'must contain at least 1 entry');
    v.check(mode.length <= MAX_MODE_ENTRIES, 'mode', 'must contain at most 5 entries');
    v.check(unique(mode), 'mode', 'must not contain duplicate entries');
};
