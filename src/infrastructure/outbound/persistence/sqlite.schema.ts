/**
 * Idempotent DDL applied when the database is opened. `mode` holds a JSON
 * array of text; `version` starts at 1 and only the update statement bumps it.
 */
export const SCHEMA_STATEMENTS = [
    `CREATE TABLE IF NOT EXISTS forums (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
        name TEXT NOT NULL,
        level TEXT NOT NULL,
        contact TEXT NOT NULL,
        phone TEXT NOT NULL,
        email TEXT NOT NULL,
        website TEXT NOT NULL,
        address TEXT NOT NULL,
        mode TEXT NOT NULL CHECK (json_valid(mode) AND json_type(mode) = 'array'),
        version INTEGER NOT NULL DEFAULT 1
    )`,
];
