import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { mock } from 'vitest-mock-extended';

import { type LoggerPort } from '../../../../application/ports/outbound/logging/logger.port.js';
import { SqliteDatabase } from '../sqlite.database.js';

describe('SqliteDatabase', () => {
    let database: SqliteDatabase;

    beforeEach(() => {
        database = new SqliteDatabase(mock<LoggerPort>(), ':memory:');
    });

    afterEach(async () => {
        await database.disconnect();
    });

    test('should refuse queries before connect', async () => {
        // When
        const result = await database.queryOne('SELECT 1 AS one');

        // Then
        expect(result).toEqual({
            detail: new Error('SQLite database is not connected'),
            status: 'store-error',
        });
    });

    test('should create the forums table on connect', async () => {
        // Given
        await database.connect();

        // When
        const result = await database.queryOne<{ name: string }>(
            `SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?`,
            ['forums'],
        );

        // Then
        expect(result).toEqual({ status: 'ok', value: { name: 'forums' } });
    });

    test('should tag an empty result as not-found', async () => {
        // Given
        await database.connect();

        // When / Then
        expect(await database.queryOne('SELECT id FROM forums WHERE id = ?', [1])).toEqual({
            status: 'not-found',
        });
    });

    test('should turn driver exceptions into store errors', async () => {
        // Given
        await database.connect();

        // When
        const result = await database.execute('INSERT INTO forums (name) VALUES (?)', ['x']);

        // Then
        expect(result.status).toBe('store-error');
    });

    test('should count changed rows', async () => {
        // Given
        await database.connect();

        // When
        const result = await database.execute('DELETE FROM forums');

        // Then
        expect(result).toEqual({ status: 'ok', value: { changes: 0 } });
    });
});
