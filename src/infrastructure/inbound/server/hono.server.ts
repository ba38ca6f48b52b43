import { serve } from '@hono/node-server';
import { Hono } from 'hono';

// Application
import {
    type ServerConfiguration,
    type ServerPort,
} from '../../../application/ports/inbound/server.port.js';
import { type LoggerPort } from '../../../application/ports/outbound/logging/logger.port.js';

import { createErrorHandlerMiddleware, notFoundHandler } from './error-handler.middleware.js';
import { type CreateForumController } from './forums/create-forum.controller.js';
import { createForumsRouter } from './forums/forums.routes.js';
import { type GetForumController } from './forums/get-forum.controller.js';
import { createHealthRouter } from './health/health.routes.js';

export class HonoServer implements ServerPort {
    private app: Hono;
    private server: null | ReturnType<typeof serve> = null;

    constructor(
        private readonly logger: LoggerPort,
        private readonly createForumController: CreateForumController,
        private readonly getForumController: GetForumController,
    ) {
        this.app = new Hono();
        this.setupGlobalMiddleware();
        this.registerRoutes();
    }

    public async request(
        path: string,
        options?: { body?: object | string; headers?: Record<string, string>; method?: string },
    ): Promise<Response> {
        const body = typeof options?.body === 'object' ? JSON.stringify(options.body) : options?.body;
        const init: RequestInit = {
            body,
            headers: options?.headers,
            method: options?.method,
        };
        return this.app.request(path, init);
    }

    public async start(config: ServerConfiguration): Promise<void> {
        return new Promise((resolve) => {
            this.logger.debug('Starting server', { host: config.host, port: config.port });

            this.server = serve(
                { fetch: this.app.fetch, hostname: config.host, port: config.port },
                (info) => {
                    this.logger.info('Server listening', { host: config.host, port: info.port });
                    resolve();
                },
            );
        });
    }

    public async stop(): Promise<void> {
        const server = this.server;
        if (!server) return;

        this.logger.info('Stopping server');
        await new Promise<void>((resolve, reject) => {
            server.close((error) => (error ? reject(error) : resolve()));
        });
        this.server = null;
        this.logger.info('Server stopped');
    }

    private registerRoutes(): void {
        this.app.route('/', createHealthRouter());
        this.app.route(
            '/forums',
            createForumsRouter(this.createForumController, this.getForumController),
        );
    }

    private setupGlobalMiddleware(): void {
        this.app.onError(createErrorHandlerMiddleware(this.logger));
        this.app.notFound(notFoundHandler);
    }
}
