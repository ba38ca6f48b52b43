import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it } from 'vitest';

import { ForumFactory } from './fixtures/forum.factory.js';
import {
    cleanupIntegrationContext,
    createIntegrationContext,
    executeRequest,
    type IntegrationContext,
    startIntegrationContext,
    stopIntegrationContext,
} from './setup/integration.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

/**
 * Integration tests for the /forums server routes.
 * Requests go through the real container, Hono router and an in-memory SQLite database.
 */
describe('Server /forums route – integration', () => {
    let integrationContext: IntegrationContext;

    const postForum = (body: object | string) =>
        executeRequest(integrationContext, '/forums', {
            body,
            headers: JSON_HEADERS,
            method: 'POST',
        });

    beforeAll(async () => {
        integrationContext = await createIntegrationContext();
    });

    afterAll(async () => {
        await cleanupIntegrationContext(integrationContext);
    });

    beforeEach(async () => {
        await startIntegrationContext(integrationContext);
    });

    afterEach(async () => {
        await stopIntegrationContext(integrationContext);
    });

    describe('POST /forums', () => {
        it('creates a forum and points Location at it', async () => {
            // Given
            const payload = ForumFactory.create().with({ mode: ['in-person'] }).build();

            // When
            const response = await postForum(payload);
            const body = await response.json();

            // Then
            expect(response.status).toBe(201);
            expect(body.forum.id).toBeGreaterThanOrEqual(1);
            expect(response.headers.get('Location')).toBe(`/forums/${body.forum.id}`);
            expect(body).toEqual({
                forum: {
                    address: '12 Regent Street, Belize City',
                    contact: 'Maria Chan',
                    email: 'info@coastal-chess.example.org',
                    id: body.forum.id,
                    level: 'Beginner',
                    mode: ['in-person'],
                    name: 'Coastal Chess Circle',
                    phone: '501-555-0101',
                    version: 1,
                    website: 'https://coastal-chess.example.org',
                },
            });
        });

        it('assigns increasing ids to successive forums', async () => {
            // When
            const first = await (await postForum(ForumFactory.create().build())).json();
            const second = await (
                await postForum(ForumFactory.create().with({ name: 'Second Circle' }).build())
            ).json();

            // Then
            expect(second.forum.id).toBeGreaterThan(first.forum.id);
        });

        it('rejects an empty mode list with the mode error only', async () => {
            // Given
            const payload = ForumFactory.create().with({ mode: [] }).build();

            // When
            const response = await postForum(payload);

            // Then
            expect(response.status).toBe(400);
            expect(await response.json()).toEqual({
                error: { mode: 'must contain at least 1 entry' },
            });
        });

        it('rejects an invalid email without flagging other fields', async () => {
            // Given
            const payload = ForumFactory.create().with({ email: 'not-an-email' }).build();

            // When
            const response = await postForum(payload);

            // Then
            expect(response.status).toBe(400);
            expect(await response.json()).toEqual({
                error: { email: 'must be a valid email address' },
            });
        });

        it('reports every missing field of an empty object in one response', async () => {
            // When
            const response = await postForum({});

            // Then
            expect(response.status).toBe(400);
            expect(await response.json()).toEqual({
                error: {
                    address: 'must be provided',
                    contact: 'must be provided',
                    email: 'must be provided',
                    level: 'must be provided',
                    mode: 'must be provided',
                    name: 'must be provided',
                    phone: 'must be provided',
                    website: 'must be provided',
                },
            });
        });

        it('rejects malformed JSON', async () => {
            // When
            const response = await postForum('{"name": "Coastal');

            // Then
            expect(response.status).toBe(400);
            expect(await response.json()).toEqual({ error: 'body contains badly-formed JSON' });
        });

        it('rejects an empty body', async () => {
            // When
            const response = await postForum('');

            // Then
            expect(response.status).toBe(400);
            expect(await response.json()).toEqual({ error: 'body must not be empty' });
        });

        it('rejects unknown keys', async () => {
            // Given
            const payload = { ...ForumFactory.create().build(), rating: 5 };

            // When
            const response = await postForum(payload);

            // Then
            expect(response.status).toBe(400);
            expect(await response.json()).toEqual({ error: 'body contains unknown key "rating"' });
        });

        it('rejects a field of the wrong JSON type', async () => {
            // Given
            const payload = { ...ForumFactory.create().build(), mode: 'in-person' };

            // When
            const response = await postForum(payload);

            // Then
            expect(response.status).toBe(400);
            expect(await response.json()).toEqual({
                error: 'body contains incorrect JSON type for field "mode"',
            });
        });

        it('answers 500 without leaking details when the store is unavailable', async () => {
            // Given
            await integrationContext.database.disconnect();

            // When
            const response = await postForum(ForumFactory.create().build());

            // Then
            expect(response.status).toBe(500);
            expect(await response.json()).toEqual({
                error: 'the server encountered a problem and could not process your request',
            });
        });
    });

    describe('GET /forums/:id', () => {
        it('returns the forum exactly as it was created', async () => {
            // Given
            const created = await (
                await postForum(ForumFactory.create().with({ mode: ['online', 'in-person'] }).build())
            ).json();

            // When
            const response = await executeRequest(
                integrationContext,
                `/forums/${created.forum.id}`,
            );

            // Then
            expect(response.status).toBe(200);
            expect(await response.json()).toEqual(created);
        });

        it('returns identical bodies for repeated reads', async () => {
            // Given
            const created = await (await postForum(ForumFactory.create().build())).json();
            const path = `/forums/${created.forum.id}`;

            // When
            const first = await (await executeRequest(integrationContext, path)).json();
            const second = await (await executeRequest(integrationContext, path)).json();

            // Then
            expect(second).toEqual(first);
        });

        it('answers 404 for an id with no row', async () => {
            // When
            const response = await executeRequest(integrationContext, '/forums/999999');

            // Then
            expect(response.status).toBe(404);
            expect(await response.json()).toEqual({
                error: 'the requested resource could not be found',
            });
        });

        it.each(['0', 'abc', '-3', '1.5'])('answers 404 for the malformed id %s', async (id) => {
            // When
            const response = await executeRequest(integrationContext, `/forums/${id}`);

            // Then
            expect(response.status).toBe(404);
        });
    });
});
