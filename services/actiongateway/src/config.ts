import { Env, envBool, envInt, envString } from '@cookbook/shared';

export interface GatewayConfig {
    port: number;
    databaseUrl: string;
    allowWrites: boolean;
    defaultFilename: string;
    rateLimit: {
        windowMs: number;
        limit: number;
    };
}

export function loadGatewayConfig(env: Env = process.env): GatewayConfig {
    return {
        port: envInt('PORT', 7071, env),
        databaseUrl: envString('DATABASE_URL', 'postgres://localhost:5432/postgres', env),
        allowWrites: envBool('GATEWAY_ALLOW_WRITES', false, env),
        defaultFilename: envString('GATEWAY_DEFAULT_FILENAME', 'query_results.csv', env),
        rateLimit: {
            windowMs: envInt('GATEWAY_RATE_LIMIT_WINDOW_MS', 60 * 1000, env),
            limit: envInt('GATEWAY_RATE_LIMIT', 60, env),
        },
    };
}
