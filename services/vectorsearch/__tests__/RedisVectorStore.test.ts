import { ErrorReply, SchemaFieldTypes, VectorAlgorithms } from 'redis';
import { RedisClient, RedisVectorStore, VectorIndexOptions } from '../src/RedisVectorStore';
import { SearchQueryComposer } from '../src/SearchQueryComposer';
import { Logger, LogLevel, RequestValidationError, ServiceError } from '@cookbook/shared';

describe('RedisVectorStore', () => {
    let ft: { info: jest.Mock; create: jest.Mock; dropIndex: jest.Mock; search: jest.Mock };
    let hSet: jest.Mock;

    const logger = new Logger('RedisTest', { minLogLevel: LogLevel.ERROR });
    const index: VectorIndexOptions = {
        name: 'articles',
        prefix: 'doc',
        vectorField: 'content_vector',
        dimension: 3,
        metric: 'COSINE',
        algorithm: 'HNSW',
        fields: { title: 'TEXT', genre: 'TAG', year: 'NUMERIC' },
    };

    function createStore(options: VectorIndexOptions = index) {
        const client = { ft, hSet } as unknown as RedisClient;
        return new RedisVectorStore(client, options, logger);
    }

    beforeEach(() => {
        ft = { info: jest.fn(), create: jest.fn(), dropIndex: jest.fn(), search: jest.fn() };
        hSet = jest.fn().mockResolvedValue(2);
    });

    describe('ensureIndex', () => {
        it('should leave an existing index alone', async () => {
            ft.info.mockResolvedValue({ indexName: 'articles' });

            await expect(createStore().ensureIndex()).resolves.toBe(false);
            expect(ft.create).not.toHaveBeenCalled();
        });

        it('should create an HNSW index over hashes when it is unknown', async () => {
            ft.info.mockRejectedValue(new ErrorReply('Unknown index name'));
            ft.create.mockResolvedValue('OK');

            await expect(createStore().ensureIndex()).resolves.toBe(true);
            expect(ft.create).toHaveBeenCalledWith(
                'articles',
                {
                    title: SchemaFieldTypes.TEXT,
                    genre: SchemaFieldTypes.TAG,
                    year: SchemaFieldTypes.NUMERIC,
                    content_vector: {
                        type: SchemaFieldTypes.VECTOR,
                        ALGORITHM: VectorAlgorithms.HNSW,
                        TYPE: 'FLOAT32',
                        DIM: 3,
                        DISTANCE_METRIC: 'COSINE',
                    },
                },
                { ON: 'HASH', PREFIX: 'doc:' }
            );
        });

        it('should create a FLAT index when asked to', async () => {
            ft.info.mockRejectedValue(new ErrorReply('Unknown index name'));
            ft.create.mockResolvedValue('OK');

            await createStore({ ...index, algorithm: 'FLAT', metric: 'L2', fields: {} }).ensureIndex();

            expect(ft.create.mock.calls[0][1]).toEqual({
                content_vector: {
                    type: SchemaFieldTypes.VECTOR,
                    ALGORITHM: VectorAlgorithms.FLAT,
                    TYPE: 'FLOAT32',
                    DIM: 3,
                    DISTANCE_METRIC: 'L2',
                },
            });
        });

        it('should report a rejected password as an auth error', async () => {
            ft.info.mockRejectedValue(new ErrorReply('WRONGPASS invalid username-password pair or user is disabled.'));

            const failure = await createStore().ensureIndex().catch((error: unknown) => error);

            expect(failure).toBeInstanceOf(ServiceError);
            expect(failure).toMatchObject({
                service: 'Redis',
                category: 'auth',
                message: 'Redis request failed: WRONGPASS invalid username-password pair or user is disabled.',
            });
            expect(ft.create).not.toHaveBeenCalled();
        });

        it('should report an unreachable server as a network error', async () => {
            ft.info.mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:6379'));
            await expect(createStore().ensureIndex()).rejects.toMatchObject({ category: 'network' });
        });
    });

    it('should drop the index and optionally its documents', async () => {
        ft.dropIndex.mockResolvedValue('OK');
        const store = createStore();

        await store.dropIndex();
        await store.dropIndex(true);

        expect(ft.dropIndex).toHaveBeenNthCalledWith(1, 'articles', undefined);
        expect(ft.dropIndex).toHaveBeenNthCalledWith(2, 'articles', { DD: true });
    });

    describe('indexDocuments', () => {
        it('should store each document as a hash with a FLOAT32 vector', async () => {
            const stored = await createStore().indexDocuments([
                { id: '1', vector: [1, 0, 0], fields: { title: 'Alpha', year: 1999 } },
                { id: '2', vector: [0, 1, 0], fields: { title: 'Beta', year: 2004 } },
            ]);

            expect(stored).toBe(2);
            expect(hSet).toHaveBeenCalledTimes(2);
            const [key, value] = hSet.mock.calls[0];
            expect(key).toBe('doc:1');
            expect(value.title).toBe('Alpha');
            expect(value.year).toBe(1999);
            expect(Buffer.isBuffer(value.content_vector)).toBe(true);
            expect(value.content_vector.readFloatLE(0)).toBe(1);
            expect(hSet.mock.calls[1][0]).toBe('doc:2');
        });

        it('should reject documents of the wrong dimension before writing', async () => {
            await expect(createStore().indexDocuments([
                { id: '1', vector: [1, 0, 0], fields: {} },
                { id: '2', vector: [1, 0], fields: {} },
            ])).rejects.toBeInstanceOf(RequestValidationError);
            expect(hSet).not.toHaveBeenCalled();
        });
    });

    describe('search', () => {
        const composer = new SearchQueryComposer({ index: 'articles', vectorField: 'content_vector', dimension: 3, metric: 'COSINE' });

        it('should issue a KNN search and keep the store ranking', async () => {
            ft.search.mockResolvedValue({
                total: 2,
                documents: [
                    { id: 'doc:2', value: { title: 'Beta', vector_score: '0.1' } },
                    { id: 'doc:1', value: { title: 'Alpha', vector_score: '0.25' } },
                ],
            });
            const query = composer.compose({ vector: [0, 1, 0], k: 2, returnFields: ['title'] });

            const hits = await createStore().search(query);

            expect(ft.search).toHaveBeenCalledWith('articles', '*=>[KNN 2 @content_vector $vector AS vector_score]', {
                PARAMS: { vector: query.params.vector },
                RETURN: ['title', 'vector_score'],
                SORTBY: 'vector_score',
                LIMIT: { from: 0, size: 2 },
                DIALECT: 2,
            });
            expect(hits).toEqual([
                { id: 'doc:2', score: 0.1, fields: { title: 'Beta' } },
                { id: 'doc:1', score: 0.25, fields: { title: 'Alpha' } },
            ]);
        });

        it('should report a malformed query as a client error', async () => {
            ft.search.mockRejectedValue(new ErrorReply('Syntax error at offset 1 near title'));
            const query = composer.compose({ vector: [0, 1, 0], k: 2, filter: '@title:', returnFields: ['title'] });

            await expect(createStore().send(query)).rejects.toMatchObject({ category: 'client' });
        });
    });
});
