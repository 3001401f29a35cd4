import { AxiosError, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { GatewayClient, GatewayQueryComposer, GatewayResultPresenter, createGatewayQueryPipeline } from '../src/client/GatewayClient';
import { Logger, LogLevel, RequestValidationError, ServiceError, encodeFile } from '@cookbook/shared';

describe('GatewayClient', () => {
    const logger = new Logger('GatewayClientTest', { minLogLevel: LogLevel.ERROR });
    let calls: InternalAxiosRequestConfig[];

    function answer(status: number, data: unknown) {
        return async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
            calls.push(config);
            const response: AxiosResponse = { data, status, statusText: String(status), headers: {}, config };
            if (status >= 400) {
                throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_REQUEST, config, null, response);
            }
            return response;
        };
    }

    const csvFile = {
        openaiFileResponse: [encodeFile('query_results.csv', 'text/csv', 'id,name\r\n1,Ada\r\n2,Grace\r\n3,"Hopper, Grace"\r\n')],
    };

    beforeEach(() => {
        calls = [];
        jest.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('GatewayQueryComposer', () => {
        it('should default to a file answer', () => {
            expect(new GatewayQueryComposer().compose({ sql: ' SELECT 1 ' })).toEqual({ query: 'SELECT 1', format: 'file' });
        });

        it('should pass the filename through', () => {
            expect(new GatewayQueryComposer().compose({ sql: 'SELECT 1', format: 'json', filename: 'one.csv' }))
                .toEqual({ query: 'SELECT 1', format: 'json', filename: 'one.csv' });
        });

        it('should reject empty SQL', () => {
            expect(() => new GatewayQueryComposer().compose({ sql: '' })).toThrow(RequestValidationError);
        });
    });

    describe('GatewayResultPresenter', () => {
        it('should parse a CSV attachment into records in file order', () => {
            const artifact = new GatewayResultPresenter().present(csvFile);

            expect(artifact.records).toEqual([
                { id: '1', name: 'Ada' },
                { id: '2', name: 'Grace' },
                { id: '3', name: 'Hopper, Grace' },
            ]);
            expect(artifact.file?.name).toBe('query_results.csv');
            expect(artifact.text.split('\n')[0]).toBe('id  name');
        });

        it('should keep non-CSV attachments as raw bytes', () => {
            const artifact = new GatewayResultPresenter().present({
                openaiFileResponse: [encodeFile('chart.png', 'image/png', Buffer.from([0x89, 0x50]))],
            });
            expect(artifact.records).toEqual([]);
            expect(artifact.file?.data.equals(Buffer.from([0x89, 0x50]))).toBe(true);
        });

        it('should pass JSON rows through', () => {
            const artifact = new GatewayResultPresenter().present({ rows: [{ n: 1 }], rowCount: 1 });
            expect(artifact.records).toEqual([{ n: 1 }]);
            expect(artifact.file).toBeUndefined();
        });
    });

    it('should post the query and return the gateway answer', async () => {
        const client = new GatewayClient({ baseURL: 'http://gateway.test', apiKey: 'test-secret', adapter: answer(200, csvFile), logger });

        const response = await client.send({ query: 'SELECT 1', format: 'file' });

        expect(response).toEqual(csvFile);
        expect(calls[0].url).toBe('/query');
        expect(calls[0].data).toBe(JSON.stringify({ query: 'SELECT 1', format: 'file' }));
        expect(calls[0].headers.get('Authorization')).toBe('Bearer test-secret');
    });

    it('should fail on an answer of unexpected shape', async () => {
        const client = new GatewayClient({ baseURL: 'http://gateway.test', adapter: answer(200, { hello: 'world' }), logger });
        await expect(client.send({ query: 'SELECT 1', format: 'file' })).rejects.toMatchObject({ category: 'server' });
    });

    it('should surface a missing credential as an auth error', async () => {
        const client = new GatewayClient({ baseURL: 'http://gateway.test', adapter: answer(401, { error: 'Unauthorized' }), logger });

        const failure = await client.send({ query: 'SELECT 1', format: 'file' }).catch((error: unknown) => error);

        expect(failure).toBeInstanceOf(ServiceError);
        expect(failure).toMatchObject({ status: 401, category: 'auth' });
    });

    it('should surface a malformed query as a client error', async () => {
        const client = new GatewayClient({ baseURL: 'http://gateway.test', adapter: answer(400, { error: 'syntax error' }), logger });
        await expect(client.send({ query: 'SELEC 1', format: 'file' })).rejects.toMatchObject({ status: 400, category: 'client' });
    });

    it('should not call the gateway when the SQL is missing', async () => {
        const pipeline = createGatewayQueryPipeline({ baseURL: 'http://gateway.test', adapter: answer(200, csvFile), logger });

        await expect(pipeline.run({ sql: '' })).rejects.toBeInstanceOf(RequestValidationError);
        expect(calls).toHaveLength(0);
    });

    it('should run the whole pipeline', async () => {
        const pipeline = createGatewayQueryPipeline({ baseURL: 'http://gateway.test', adapter: answer(200, csvFile), logger });

        const { request, artifact } = await pipeline.run({ sql: 'SELECT id, name FROM users' });

        expect(request).toEqual({ query: 'SELECT id, name FROM users', format: 'file' });
        expect(artifact.records.map(record => record.name)).toEqual(['Ada', 'Grace', 'Hopper, Grace']);
    });
});
