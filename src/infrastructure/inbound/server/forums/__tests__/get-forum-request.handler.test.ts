import { describe, expect, test } from 'vitest';

import { RecordNotFoundError } from '../../../../../domain/errors/record-not-found.error.js';
import { GetForumRequestHandler } from '../get-forum-request.handler.js';

describe('GetForumRequestHandler', () => {
    const handler = new GetForumRequestHandler();

    test.each([
        ['1', 1],
        ['42', 42],
        ['0', 0],
    ])('should parse %s', (raw, expected) => {
        expect(handler.handle(raw)).toBe(expected);
    });

    test.each(['abc', '-1', '1.5', '1e3', '', '99999999999999999999'])(
        'should treat %j as an unknown resource',
        (raw) => {
            expect(() => handler.handle(raw)).toThrow(RecordNotFoundError);
        },
    );
});
