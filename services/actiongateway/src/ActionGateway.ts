import express from 'express';
import bodyParser from 'body-parser';
import rateLimit from 'express-rate-limit';
import { Server } from 'http';
import { Logger, Pipeline, RequestValidationError, ServiceError } from '@cookbook/shared';
import { SqlExecutor } from './sql/SqlExecutor';
import { QueryComposer, SqlClient, QueryResultPresenter, SqlRequest, SqlOutcome, QueryEndpointResponse } from './QueryStages';
import { GatewayConfig } from './config';

export interface ActionGatewayOptions {
    executor: SqlExecutor;
    config: Pick<GatewayConfig, 'allowWrites' | 'defaultFilename' | 'rateLimit'>;
    logger?: Logger;
}

/**
 * HTTP action endpoint that lets a chat assistant run SQL: POST /query forwards the statement to the
 * database and answers with a CSV file envelope or with JSON rows.
 */
export class ActionGateway {
    public readonly app: express.Application;
    private readonly executor: SqlExecutor;
    private readonly logger: Logger;
    private readonly pipeline: Pipeline<unknown, SqlRequest, SqlOutcome, QueryEndpointResponse>;
    private server: Server | null = null;

    constructor(options: ActionGatewayOptions) {
        this.executor = options.executor;
        this.logger = options.logger || new Logger('ActionGateway');
        this.pipeline = new Pipeline(
            new QueryComposer(options.config),
            new SqlClient(this.executor),
            new QueryResultPresenter(),
            { logger: this.logger.createChildLogger('query') }
        );
        this.app = express();
        this.setupRoutes(options.config.rateLimit);
    }

    private setupRoutes(limits: GatewayConfig['rateLimit']) {
        this.app.get('/health', (req: express.Request, res: express.Response): void => {
            res.status(200).json({
                status: 'healthy',
                timestamp: new Date().toISOString(),
            });
        });

        this.app.use(bodyParser.json({ limit: '1mb' }));

        const queryLimiter = rateLimit({
            windowMs: limits.windowMs,
            limit: limits.limit,
            standardHeaders: true,
            legacyHeaders: false,
        });

        this.app.post('/query', queryLimiter, (req, res) => {
            void this.handleQuery(req, res);
        });

        // body-parser reports malformed JSON through the error chain
        this.app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
            if (err instanceof SyntaxError) {
                res.status(400).json({ error: 'Request body is not valid JSON' });
                return;
            }
            next(err);
        });
    }

    private async handleQuery(req: express.Request, res: express.Response): Promise<void> {
        try {
            const { artifact } = await this.pipeline.run(req.body);
            res.status(200).json(artifact);
        } catch (error) {
            if (error instanceof RequestValidationError) {
                res.status(400).json({ error: error.message, field: error.field });
            } else if (error instanceof ServiceError && error.category === 'client') {
                res.status(400).json({ error: error.message, details: error.details });
            } else if (error instanceof ServiceError) {
                res.status(502).json({ error: error.message });
            } else {
                res.status(500).json({ error: 'Internal server error' });
            }
        }
    }

    start(port: number): Promise<Server> {
        return new Promise((resolve) => {
            const server = this.app.listen(port, () => {
                this.logger.info(`ActionGateway listening at http://0.0.0.0:${port}`);
                resolve(server);
            });
            this.server = server;
        });
    }

    async stop(): Promise<void> {
        const server = this.server;
        this.server = null;
        if (server) {
            await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
        }
        await this.executor.close();
        this.logger.info('ActionGateway stopped');
    }
}
