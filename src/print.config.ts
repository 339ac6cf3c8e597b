import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

const logger = new Logger('Configuration');

export const ENVIRONMENTS = ['development', 'homologation', 'production', 'sandbox'] as const;
export type Environment = typeof ENVIRONMENTS[number];

export interface ServerConfig {
    environment: Environment;
    host: string;
    port: number;
}

export function loadServerConfig(configService: ConfigService): ServerConfig {
    const environment = configService.get<string>('ENVIRONMENT', 'development');
    const port = parseInt(configService.get<string>('PORT', '3005'), 10);

    return {
        environment: isEnvironment(environment) ? environment : 'development',
        host: configService.get<string>('HOST', '127.0.0.1'),
        port: Number.isNaN(port) ? 3005 : port,
    };
}

function isEnvironment(value: string): value is Environment {
    return ENVIRONMENTS.some((environment) => environment === value);
}

export function printConfig(config: ServerConfig): void {
    logger.log('=================================');
    logger.log(`🚀 Environment: ${config.environment}`);
    logger.log(`Running on ${config.host}:${config.port}`);
    logger.log(`📖 Swagger UI: http://${config.host}:${config.port}/api`);
    logger.log('=================================');
}
