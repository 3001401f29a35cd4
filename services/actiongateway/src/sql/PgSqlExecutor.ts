import { Pool, PoolConfig, QueryResult } from 'pg';
import { Logger } from '@cookbook/shared';
import { ExecuteOptions, SqlExecutor, SqlResult } from './SqlExecutor';

type Row = Record<string, unknown>;

/**
 * Runs statements on PostgreSQL through a connection pool.
 */
export class PgSqlExecutor implements SqlExecutor {
    private readonly pool: Pool;
    private readonly logger: Logger;

    constructor(config: PoolConfig, logger: Logger = new Logger('PgSqlExecutor')) {
        this.pool = new Pool(config);
        this.logger = logger;
        this.pool.on('error', (err) => this.logger.error('Idle database client failed', err));
    }

    async execute(sql: string, options: ExecuteOptions = {}): Promise<SqlResult> {
        const result = options.readOnly
            ? await this.executeReadOnly(sql)
            : await this.pool.query<Row>(sql);
        this.logger.debug('Statement executed', { command: result.command, rowCount: result.rowCount, readOnly: options.readOnly === true });
        return {
            columns: result.fields.map(field => field.name),
            rows: result.rows,
        };
    }

    private async executeReadOnly(sql: string): Promise<QueryResult<Row>> {
        const client = await this.pool.connect();
        try {
            await client.query('BEGIN READ ONLY');
            const result = await client.query<Row>(sql);
            await client.query('COMMIT');
            return result;
        } catch (error) {
            await client.query('ROLLBACK').catch((rollbackError: unknown) => {
                this.logger.warn('Rollback failed', { error: rollbackError instanceof Error ? rollbackError.message : String(rollbackError) });
            });
            throw error;
        } finally {
            client.release();
        }
    }

    async close(): Promise<void> {
        await this.pool.end();
    }
}
