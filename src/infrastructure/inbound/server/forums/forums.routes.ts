import { Hono } from 'hono';
import { bodyLimit } from 'hono/body-limit';

import { type CreateForumController } from './create-forum.controller.js';
import { MAX_BODY_BYTES } from './create-forum-request.handler.js';
import { type GetForumController } from './get-forum.controller.js';

export const createForumsRouter = (
    createForumController: CreateForumController,
    getForumController: GetForumController,
) => {
    const app = new Hono();

    app.post(
        '/',
        bodyLimit({
            maxSize: MAX_BODY_BYTES,
            onError: (c) =>
                c.json({ error: `body must not be larger than ${MAX_BODY_BYTES} bytes` }, 400),
        }),
        async (c) => {
            const { body, location } = await createForumController.createForum(
                await c.req.text(),
            );

            c.header('Location', location);
            return c.json(body, 201);
        },
    );

    app.get('/:id', async (c) => {
        const response = await getForumController.getForum(c.req.param('id'));

        return c.json(response);
    });

    return app;
};
