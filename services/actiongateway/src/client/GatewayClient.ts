import { AxiosAdapter, AxiosInstance } from 'axios';
import {
    RequestComposer,
    ServiceClient,
    ResponsePresenter,
    RequestValidationError,
    ServiceError,
    createServiceAxios,
    isGatewayFileResponse,
    decodeFile,
    parseCsv,
    renderTextTable,
    DecodedFile,
    Logger,
    Pipeline,
} from '@cookbook/shared';
import { QueryEndpointResponse, ResultFormat, SqlRowsResponse } from '../QueryStages';

export interface GatewayQueryInput {
    sql: string;
    format?: ResultFormat;
    filename?: string;
}

export interface GatewayQueryRequest {
    query: string;
    format: ResultFormat;
    filename?: string;
}

export interface GatewayArtifact {
    records: Record<string, unknown>[];
    /** Present when the gateway answered with a file attachment */
    file?: DecodedFile;
    /** Records rendered as a console table */
    text: string;
}

export class GatewayQueryComposer implements RequestComposer<GatewayQueryInput, GatewayQueryRequest> {
    compose(input: GatewayQueryInput): GatewayQueryRequest {
        if (typeof input.sql !== 'string' || input.sql.trim() === '') {
            throw new RequestValidationError('sql is required', 'sql');
        }
        const request: GatewayQueryRequest = { query: input.sql.trim(), format: input.format || 'file' };
        if (input.filename) {
            request.filename = input.filename;
        }
        return request;
    }
}

export interface GatewayClientOptions {
    baseURL: string;
    apiKey?: string;
    /** Path of the query action on the gateway */
    path?: string;
    timeout?: number;
    adapter?: AxiosAdapter;
    logger?: Logger;
}

function isRowsResponse(value: unknown): value is SqlRowsResponse {
    return typeof value === 'object' && value !== null && 'rows' in value && Array.isArray(value.rows);
}

/**
 * Calls a SQL action endpoint over HTTP.
 */
export class GatewayClient implements ServiceClient<GatewayQueryRequest, QueryEndpointResponse> {
    readonly serviceName = 'ActionGateway';
    private readonly api: AxiosInstance;
    private readonly path: string;

    constructor(options: GatewayClientOptions) {
        this.path = options.path || '/query';
        this.api = createServiceAxios({
            serviceName: this.serviceName,
            baseURL: options.baseURL,
            apiKey: options.apiKey,
            timeout: options.timeout,
            adapter: options.adapter,
            logger: options.logger,
        });
    }

    async send(request: GatewayQueryRequest): Promise<QueryEndpointResponse> {
        const response = await this.api.post<unknown>(this.path, request);
        const body = response.data;
        if (isGatewayFileResponse(body) || isRowsResponse(body)) {
            return body;
        }
        throw new ServiceError(this.serviceName, 'Gateway answered with neither rows nor a file envelope', {
            status: response.status,
            category: 'server',
            details: body,
        });
    }
}

/**
 * Decodes the first attachment of a file answer (parsing CSV into records), or passes rows through.
 */
export class GatewayResultPresenter implements ResponsePresenter<QueryEndpointResponse, GatewayArtifact> {
    present(response: QueryEndpointResponse): GatewayArtifact {
        if (isRowsResponse(response)) {
            return { records: response.rows, text: renderTextTable(response.rows) };
        }
        const [first] = response.openaiFileResponse;
        if (!first) {
            return { records: [], text: '' };
        }
        const file = decodeFile(first);
        const records = file.mimeType === 'text/csv' ? parseCsv(file.data.toString('utf8')) : [];
        return { records, file, text: renderTextTable(records) };
    }
}

export function createGatewayQueryPipeline(options: GatewayClientOptions) {
    return new Pipeline(
        new GatewayQueryComposer(),
        new GatewayClient(options),
        new GatewayResultPresenter(),
        { logger: options.logger }
    );
}
