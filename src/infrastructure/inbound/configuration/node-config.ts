import { z } from 'zod/v4';

// Configuration
import {
    type ConfigurationPort,
    type InboundConfigurationPort,
    type OutboundConfigurationPort,
} from '../../../application/ports/inbound/configuration.port.js';
import { LoggerLevelSchema } from '../../../application/ports/outbound/logging/logger.port.js';

const configurationSchema = z.object({
    inbound: z.object({
        env: z.enum(['development', 'production', 'test']),
        http: z.object({
            host: z.string().min(1),
            port: z.coerce.number().int().positive(),
        }),
        logger: z.object({
            level: LoggerLevelSchema,
            prettyPrint: z.boolean(),
        }),
    }),
    outbound: z.object({
        sqlite: z.object({
            databasePath: z.string().min(1),
        }),
    }),
});

type Configuration = z.infer<typeof configurationSchema>;

export type ConfigurationOverrides = {
    databasePath?: string;
};

/**
 * Node.js configuration loader backed by node-config
 */
export class NodeConfig implements ConfigurationPort {
    private readonly configuration: Configuration;

    constructor(configurationInput: unknown, overrides?: ConfigurationOverrides) {
        // Parse and validate first
        const parsed = configurationSchema.parse(configurationInput);

        // Apply override after parsing
        if (overrides?.databasePath) {
            parsed.outbound.sqlite.databasePath = overrides.databasePath;
        }

        this.configuration = parsed;
    }

    public getInboundConfiguration(): InboundConfigurationPort {
        return this.configuration.inbound;
    }

    public getOutboundConfiguration(): OutboundConfigurationPort {
        return this.configuration.outbound;
    }
}
