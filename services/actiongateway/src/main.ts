import { loadEnv, Logger, reportError } from '@cookbook/shared';
import { loadGatewayConfig } from './config';
import { PgSqlExecutor } from './sql/PgSqlExecutor';
import { ActionGateway } from './ActionGateway';

loadEnv();

const logger = new Logger('ActionGateway');

async function main(): Promise<void> {
    const config = loadGatewayConfig();
    const gateway = new ActionGateway({
        executor: new PgSqlExecutor({ connectionString: config.databaseUrl }),
        config,
        logger,
    });

    await gateway.start(config.port);

    const shutdown = (signal: string) => {
        logger.info(`Received ${signal}, shutting down`);
        gateway.stop().then(
            () => process.exit(0),
            (error: unknown) => {
                reportError(error, logger);
                process.exit(1);
            }
        );
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
    reportError(error, logger);
    process.exit(1);
});
