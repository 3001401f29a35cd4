import { createClient, ErrorReply, RediSearchSchema, SchemaFieldTypes, VectorAlgorithms } from 'redis';
import {
    Logger,
    RequestValidationError,
    ServiceClient,
    ServiceErrorCategory,
    formatValue,
    toServiceError,
} from '@cookbook/shared';
import { DistanceMetric, IndexAlgorithm } from './config';
import { SCORE_FIELD, VectorQuery, toFloat32Buffer } from './SearchQueryComposer';

export type RedisClient = ReturnType<typeof createClient>;

export type ScalarFieldType = 'TEXT' | 'TAG' | 'NUMERIC';

export interface VectorIndexOptions {
    name: string;
    /** Documents are stored as hashes under `<prefix>:<id>` */
    prefix: string;
    vectorField: string;
    dimension: number;
    metric: DistanceMetric;
    algorithm: IndexAlgorithm;
    /** Scalar fields indexed next to the vector, for hybrid queries */
    fields: Record<string, ScalarFieldType>;
}

export interface VectorDocument {
    id: string;
    vector: number[];
    fields: Record<string, string | number>;
}

export interface SearchHit {
    id: string;
    /** Distance reported by the store; lower is closer */
    score: number;
    fields: Record<string, string>;
}

export function redisErrorCategory(error: unknown): ServiceErrorCategory {
    if (error instanceof Error && /^(NOAUTH|WRONGPASS)/.test(error.message)) {
        return 'auth';
    }
    if (error instanceof ErrorReply) {
        return 'client';
    }
    return 'network';
}

function isUnknownIndex(error: unknown): boolean {
    return error instanceof Error && /unknown index name|no such index/i.test(error.message);
}

function scalarSchemaField(type: ScalarFieldType): RediSearchSchema[string] {
    switch (type) {
        case 'TEXT': return SchemaFieldTypes.TEXT;
        case 'TAG': return SchemaFieldTypes.TAG;
        case 'NUMERIC': return SchemaFieldTypes.NUMERIC;
    }
}

/**
 * Vector index kept in Redis: RediSearch owns indexing and KNN, this class only issues its commands.
 */
export class RedisVectorStore implements ServiceClient<VectorQuery, SearchHit[]> {
    readonly serviceName = 'Redis';
    private readonly logger: Logger;

    constructor(
        private readonly client: RedisClient,
        private readonly index: VectorIndexOptions,
        logger?: Logger
    ) {
        this.logger = logger || new Logger('RedisVectorStore');
    }

    private toError(error: unknown) {
        return toServiceError(error, this.serviceName, redisErrorCategory(error));
    }

    private schema(): RediSearchSchema {
        const schema: RediSearchSchema = {};
        for (const [name, type] of Object.entries(this.index.fields)) {
            schema[name] = scalarSchemaField(type);
        }
        const { vectorField, dimension, metric } = this.index;
        schema[vectorField] = this.index.algorithm === 'FLAT'
            ? { type: SchemaFieldTypes.VECTOR, ALGORITHM: VectorAlgorithms.FLAT, TYPE: 'FLOAT32', DIM: dimension, DISTANCE_METRIC: metric }
            : { type: SchemaFieldTypes.VECTOR, ALGORITHM: VectorAlgorithms.HNSW, TYPE: 'FLOAT32', DIM: dimension, DISTANCE_METRIC: metric };
        return schema;
    }

    /**
     * Creates the index unless it already exists. Resolves to true when it was created.
     */
    async ensureIndex(): Promise<boolean> {
        try {
            await this.client.ft.info(this.index.name);
            this.logger.debug(`Index ${this.index.name} already exists`);
            return false;
        } catch (error) {
            if (!isUnknownIndex(error)) {
                throw this.toError(error);
            }
        }

        try {
            await this.client.ft.create(this.index.name, this.schema(), {
                ON: 'HASH',
                PREFIX: `${this.index.prefix}:`,
            });
        } catch (error) {
            throw this.toError(error);
        }
        this.logger.info(`Created index ${this.index.name}`, {
            algorithm: this.index.algorithm,
            metric: this.index.metric,
            dimension: this.index.dimension,
        });
        return true;
    }

    async dropIndex(deleteDocuments = false): Promise<void> {
        try {
            await this.client.ft.dropIndex(this.index.name, deleteDocuments ? { DD: true } : undefined);
        } catch (error) {
            throw this.toError(error);
        }
        this.logger.info(`Dropped index ${this.index.name}`, { deleteDocuments });
    }

    /**
     * Stores each document as a hash, the vector packed as FLOAT32. Resolves to the number stored.
     */
    async indexDocuments(documents: ReadonlyArray<VectorDocument>): Promise<number> {
        for (const document of documents) {
            if (document.vector.length !== this.index.dimension) {
                throw new RequestValidationError(
                    `Document ${document.id} has ${document.vector.length} dimensions, the index expects ${this.index.dimension}`,
                    'vector'
                );
            }
        }

        let stored = 0;
        for (const document of documents) {
            try {
                await this.client.hSet(`${this.index.prefix}:${document.id}`, {
                    ...document.fields,
                    [this.index.vectorField]: toFloat32Buffer(document.vector),
                });
            } catch (error) {
                throw this.toError(error);
            }
            stored++;
        }
        this.logger.info(`Indexed ${stored} documents`, { index: this.index.name });
        return stored;
    }

    async search(query: VectorQuery): Promise<SearchHit[]> {
        try {
            const reply = await this.client.ft.search(query.index, query.query, {
                PARAMS: { vector: query.params.vector },
                RETURN: [...query.returnFields, SCORE_FIELD],
                SORTBY: SCORE_FIELD,
                LIMIT: { from: 0, size: query.k },
                DIALECT: 2,
            });
            this.logger.debug(`Search returned ${reply.documents.length} of ${reply.total} hits`);
            return reply.documents.map(document => {
                const fields: Record<string, string> = {};
                for (const [name, value] of Object.entries(document.value)) {
                    if (name !== SCORE_FIELD) {
                        fields[name] = formatValue(value);
                    }
                }
                return {
                    id: document.id,
                    score: Number(document.value[SCORE_FIELD]),
                    fields,
                };
            });
        } catch (error) {
            throw this.toError(error);
        }
    }

    send(query: VectorQuery): Promise<SearchHit[]> {
        return this.search(query);
    }
}
