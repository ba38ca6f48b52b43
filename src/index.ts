import { createContainer } from './di/container.js';

const start = async () => {
    const container = createContainer();
    const logger = container.get('Logger');
    const config = container.get('Configuration');
    const database = container.get('Database');
    const server = container.get('Server');

    const shutdown = async (signal: string) => {
        logger.info('app:shutdown', { signal });
        await server.stop();
        await database.disconnect();
        process.exit(0);
    };

    try {
        logger.info('app:start', { env: config.getInboundConfiguration().env });

        const { host, port } = config.getInboundConfiguration().http;

        await database.connect();
        await server.start({
            host,
            port,
        });

        for (const signal of ['SIGINT', 'SIGTERM'] as const) {
            process.once(signal, () => {
                shutdown(signal).catch((error: unknown) => {
                    logger.error('app:shutdown-error', { error });
                    process.exit(1);
                });
            });
        }

        logger.info('app:ready', { host, port });
    } catch (error) {
        logger.error('app:error', { error });
        process.exit(1);
    }
};

start();
