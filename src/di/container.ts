import { Container, Injectable } from '@snap/ts-inject';
import { default as nodeConfiguration } from 'config';

// Configuration
import type { ConfigurationPort } from '../application/ports/inbound/configuration.port.js';
import {
    type ConfigurationOverrides,
    NodeConfig,
} from '../infrastructure/inbound/configuration/node-config.js';

// Application
import type { ServerPort } from '../application/ports/inbound/server.port.js';
import type { LoggerPort } from '../application/ports/outbound/logging/logger.port.js';
import type { ForumRepositoryPort } from '../application/ports/outbound/persistence/forum-repository.port.js';
import { CreateForumUseCase } from '../application/use-cases/forums/create-forum.use-case.js';
import { GetForumUseCase } from '../application/use-cases/forums/get-forum.use-case.js';

// Infrastructure
import { CreateForumController } from '../infrastructure/inbound/server/forums/create-forum.controller.js';
import { GetForumController } from '../infrastructure/inbound/server/forums/get-forum.controller.js';
import { HonoServer } from '../infrastructure/inbound/server/hono.server.js';
import { PinoLogger } from '../infrastructure/outbound/logging/pino.logger.js';
import { SqliteForumRepository } from '../infrastructure/outbound/persistence/forum/sqlite-forum.repository.js';
import { SqliteDatabase } from '../infrastructure/outbound/persistence/sqlite.database.js';

/**
 * Outbound adapters
 */
const loggerFactory = Injectable(
    'Logger',
    ['Configuration'] as const,
    (config: ConfigurationPort): LoggerPort =>
        new PinoLogger({
            level: config.getInboundConfiguration().logger.level,
            prettyPrint: config.getInboundConfiguration().logger.prettyPrint,
        }),
);

const databaseFactory = Injectable(
    'Database',
    ['Logger', 'Configuration'] as const,
    (logger: LoggerPort, config: ConfigurationPort) =>
        new SqliteDatabase(logger, config.getOutboundConfiguration().sqlite.databasePath),
);

/**
 * Repository adapters
 */
const forumRepositoryFactory = Injectable(
    'ForumRepository',
    ['Database', 'Logger'] as const,
    (db: SqliteDatabase, logger: LoggerPort): ForumRepositoryPort => {
        logger.info('Initializing Forum repository', { repository: 'SqliteForum' });
        return new SqliteForumRepository(db);
    },
);

/**
 * Use case factories
 */
const createForumUseCaseFactory = Injectable(
    'CreateForum',
    ['ForumRepository', 'Logger'] as const,
    (forumRepository: ForumRepositoryPort, logger: LoggerPort) =>
        new CreateForumUseCase(forumRepository, logger),
);

const getForumUseCaseFactory = Injectable(
    'GetForum',
    ['ForumRepository'] as const,
    (forumRepository: ForumRepositoryPort) => new GetForumUseCase(forumRepository),
);

/**
 * Controller factories
 */
const controllersFactory = Injectable(
    'Controllers',
    ['CreateForum', 'GetForum'] as const,
    (createForum: CreateForumUseCase, getForum: GetForumUseCase) => ({
        createForum: new CreateForumController(createForum),
        getForum: new GetForumController(getForum),
    }),
);

/**
 * Inbound adapters
 */
const configurationFactory = (overrides?: ContainerOverrides) =>
    Injectable('Configuration', (): ConfigurationPort => new NodeConfig(nodeConfiguration, overrides));

const serverFactory = Injectable(
    'Server',
    ['Logger', 'Controllers'] as const,
    (
        logger: LoggerPort,
        controllers: { createForum: CreateForumController; getForum: GetForumController },
    ): ServerPort => {
        logger.info('Initializing Server', { implementation: 'Hono' });
        return new HonoServer(logger, controllers.createForum, controllers.getForum);
    },
);

/**
 * Container configuration
 */
export type ContainerOverrides = ConfigurationOverrides;

export const createContainer = (overrides?: ContainerOverrides) =>
    Container
        // Outbound adapters
        .provides(configurationFactory(overrides))
        .provides(loggerFactory)
        .provides(databaseFactory)
        // Repositories
        .provides(forumRepositoryFactory)
        // Use cases
        .provides(createForumUseCaseFactory)
        .provides(getForumUseCaseFactory)
        // Controllers
        .provides(controllersFactory)
        // Inbound adapters
        .provides(serverFactory);
