import { Logger, Pipeline, reportError } from '@cookbook/shared';
import { EmbeddingClient } from './EmbeddingClient';
import { RedisVectorStore, SearchHit, VectorDocument } from './RedisVectorStore';
import { SearchInput, SearchQueryComposer, VectorQuery } from './SearchQueryComposer';
import { SearchArtifact, SearchResultPresenter } from './SearchResultPresenter';
import { DistanceMetric } from './config';

export interface VectorSearchRecipeOptions {
    embeddings: EmbeddingClient;
    store: RedisVectorStore;
    index: {
        name: string;
        vectorField: string;
        dimension: number;
        metric: DistanceMetric;
    };
    /** Fields returned with every hit unless a search names its own */
    returnFields: string[];
    titleField?: string;
    logger?: Logger;
}

export interface SearchOptions {
    k?: number;
    filter?: string;
    returnFields?: string[];
}

/**
 * Semantic search over a Redis index: embed the query text, run a KNN (or hybrid) query, rank the hits.
 */
export class VectorSearchRecipe {
    private readonly embeddings: EmbeddingClient;
    private readonly store: RedisVectorStore;
    private readonly returnFields: string[];
    private readonly logger: Logger;
    private readonly pipeline: Pipeline<SearchInput, VectorQuery, SearchHit[], SearchArtifact>;

    constructor(options: VectorSearchRecipeOptions) {
        this.embeddings = options.embeddings;
        this.store = options.store;
        this.returnFields = options.returnFields;
        this.logger = options.logger || new Logger('VectorSearch');
        this.pipeline = new Pipeline<SearchInput, VectorQuery, SearchHit[], SearchArtifact>(
            new SearchQueryComposer({
                index: options.index.name,
                vectorField: options.index.vectorField,
                dimension: options.index.dimension,
                metric: options.index.metric,
            }),
            this.store,
            new SearchResultPresenter({ metric: options.index.metric, titleField: options.titleField }),
            { logger: this.logger.createChildLogger('search') }
        );
    }

    /**
     * Creates the index if needed and stores the documents.
     */
    async ingest(documents: ReadonlyArray<VectorDocument>): Promise<number> {
        try {
            await this.store.ensureIndex();
            return await this.store.indexDocuments(documents);
        } catch (error) {
            reportError(error, this.logger);
            throw error;
        }
    }

    async search(text: string, options: SearchOptions = {}): Promise<SearchArtifact> {
        let vector: number[];
        try {
            vector = await this.embeddings.embed(text);
        } catch (error) {
            reportError(error, this.logger);
            throw error;
        }

        const { artifact } = await this.pipeline.run({
            vector,
            k: options.k ?? 10,
            filter: options.filter,
            returnFields: options.returnFields || this.returnFields,
        });
        this.logger.info(`Found ${artifact.rows.length} results for "${text}"`);
        return artifact;
    }
}
