import {
    RequestComposer,
    ServiceClient,
    ResponsePresenter,
    RequestValidationError,
    ServiceError,
    toServiceError,
    encodeFile,
    toCsv,
    columnsOf,
    GatewayFileResponse,
} from '@cookbook/shared';
import { SqlExecutor, SqlResult, isSqlStateError } from './sql/SqlExecutor';
import { isReadOnlyStatement } from './sql/statement';

export type ResultFormat = 'file' | 'json';

export interface SqlRequest {
    sql: string;
    format: ResultFormat;
    filename: string;
    /** Enforced by the database as well as by the composer's statement check */
    readOnly: boolean;
}

export interface SqlRowsResponse {
    rows: Record<string, unknown>[];
    rowCount: number;
}

export type QueryEndpointResponse = GatewayFileResponse | SqlRowsResponse;

/** A result set together with the request it answers */
export interface SqlOutcome {
    request: SqlRequest;
    result: SqlResult;
}

export interface QueryComposerOptions {
    allowWrites: boolean;
    defaultFilename: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates the body of POST /query: `{ query, format?, filename? }`.
 */
export class QueryComposer implements RequestComposer<unknown, SqlRequest> {
    constructor(private readonly options: QueryComposerOptions) {}

    compose(body: unknown): SqlRequest {
        if (!isRecord(body)) {
            throw new RequestValidationError('Request body must be a JSON object');
        }
        const { query, format = 'file', filename = this.options.defaultFilename } = body;

        if (typeof query !== 'string' || query.trim() === '') {
            throw new RequestValidationError('query must be a non-empty SQL string', 'query');
        }
        if (format !== 'file' && format !== 'json') {
            throw new RequestValidationError("format must be 'file' or 'json'", 'format');
        }
        if (typeof filename !== 'string' || !/^[\w.-]+$/.test(filename)) {
            throw new RequestValidationError('filename may only contain letters, digits, dots, dashes and underscores', 'filename');
        }
        if (!this.options.allowWrites && !isReadOnlyStatement(query)) {
            throw new RequestValidationError('Only a single read-only statement (SELECT, WITH, SHOW, EXPLAIN, VALUES) is accepted', 'query');
        }

        return {
            sql: query.trim(),
            format,
            filename: filename.toLowerCase().endsWith('.csv') ? filename : `${filename}.csv`,
            readOnly: !this.options.allowWrites,
        };
    }
}

/**
 * Forwards the statement to the database. Errors the database reports for the statement are client
 * errors (SQLSTATE class 28, invalid authorization, is an auth error); anything else means the
 * database could not be reached.
 */
export class SqlClient implements ServiceClient<SqlRequest, SqlOutcome> {
    readonly serviceName = 'Database';

    constructor(private readonly executor: SqlExecutor) {}

    async send(request: SqlRequest): Promise<SqlOutcome> {
        try {
            const result = await this.executor.execute(request.sql, { readOnly: request.readOnly });
            return { request, result };
        } catch (error) {
            if (isSqlStateError(error)) {
                throw new ServiceError(this.serviceName, error.message, {
                    category: error.code.startsWith('28') ? 'auth' : 'client',
                    details: { code: error.code },
                    cause: error,
                });
            }
            throw toServiceError(error, this.serviceName);
        }
    }
}

/**
 * Turns a result set into the endpoint's answer: a CSV attachment, or the rows as JSON.
 */
export class QueryResultPresenter implements ResponsePresenter<SqlOutcome, QueryEndpointResponse> {
    present({ request, result }: SqlOutcome): QueryEndpointResponse {
        if (request.format === 'json') {
            return { rows: result.rows, rowCount: result.rows.length };
        }
        const columns = result.rows.length > 0 ? columnsOf(result.rows) : result.columns;
        const csv = toCsv(result.rows, columns);
        return { openaiFileResponse: [encodeFile(request.filename, 'text/csv', csv)] };
    }
}
