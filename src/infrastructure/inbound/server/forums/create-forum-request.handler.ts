import { z } from 'zod/v4';

// Domain
import { type ForumDetails } from '../../../../domain/entities/forum.entity.js';
import { BadRequestError } from '../../../../domain/errors/bad-request.error.js';

export const MAX_BODY_BYTES = 1_048_576;

/**
 * Absent or null text decodes to an empty string so the entity rules report it
 */
const textSchema = z
    .string()
    .nullish()
    .transform((value) => value ?? '');

/**
 * Schema for the JSON body of POST /forums
 */
const createForumBodySchema = z.strictObject({
    address: textSchema,
    contact: textSchema,
    email: textSchema,
    level: textSchema,
    mode: z
        .array(z.string())
        .nullish()
        .transform((value) => value ?? null),
    name: textSchema,
    phone: textSchema,
    website: textSchema,
});

/**
 * Decodes the raw body of POST /forums into forum details
 */
export class CreateForumRequestHandler {
    /**
     * @throws BadRequestError when the body is empty, not JSON, or not shaped like a forum
     */
    handle(rawBody: string): ForumDetails {
        if (rawBody.trim() === '') {
            throw new BadRequestError('body must not be empty');
        }

        let payload: unknown;
        try {
            payload = JSON.parse(rawBody);
        } catch (error) {
            throw new BadRequestError('body contains badly-formed JSON', { cause: error });
        }

        const parsed = createForumBodySchema.safeParse(payload);
        if (!parsed.success) {
            throw new BadRequestError(this.describe(parsed.error.issues));
        }

        return parsed.data;
    }

    private describe(issues: z.ZodError['issues']): string {
        const unknownKey = issues.find((issue) => issue.code === 'unrecognized_keys');
        if (unknownKey && unknownKey.code === 'unrecognized_keys') {
            return `body contains unknown key "${unknownKey.keys[0]}"`;
        }

        const [field] = issues[0]?.path ?? [];
        if (field === undefined) {
            return 'body must contain a JSON object';
        }

        return `body contains incorrect JSON type for field "${String(field)}"`;
    }
}
