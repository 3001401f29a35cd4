import { ConfigurationError, Env, envInt, envOptional, envString, requireEnv } from '@cookbook/shared';

export type DistanceMetric = 'COSINE' | 'L2' | 'IP';
export type IndexAlgorithm = 'HNSW' | 'FLAT';

export interface VectorSearchConfig {
    openai: {
        apiKey: string;
        baseURL?: string;
        embeddingModel: string;
    };
    redisUrl: string;
    index: {
        name: string;
        prefix: string;
        vectorField: string;
        dimension: number;
        metric: DistanceMetric;
        algorithm: IndexAlgorithm;
    };
    /** CSV of pre-embedded articles to load before searching */
    articlesPath?: string;
    cacheDir?: string;
}

function parseMetric(value: string): DistanceMetric {
    const metric = value.toUpperCase();
    if (metric === 'COSINE' || metric === 'L2' || metric === 'IP') {
        return metric;
    }
    throw new ConfigurationError('VECTOR_DISTANCE_METRIC', `VECTOR_DISTANCE_METRIC must be COSINE, L2 or IP, got "${value}"`);
}

function parseAlgorithm(value: string): IndexAlgorithm {
    const algorithm = value.toUpperCase();
    if (algorithm === 'HNSW' || algorithm === 'FLAT') {
        return algorithm;
    }
    throw new ConfigurationError('VECTOR_INDEX_ALGORITHM', `VECTOR_INDEX_ALGORITHM must be HNSW or FLAT, got "${value}"`);
}

export function loadVectorSearchConfig(env: Env = process.env): VectorSearchConfig {
    const dimension = envInt('VECTOR_DIMENSION', 1536, env);
    if (dimension <= 0) {
        throw new ConfigurationError('VECTOR_DIMENSION', `VECTOR_DIMENSION must be positive, got "${dimension}"`);
    }
    return {
        openai: {
            apiKey: requireEnv('OPENAI_API_KEY', env),
            baseURL: envOptional('OPENAI_BASE_URL', env),
            embeddingModel: envString('EMBEDDING_MODEL', 'text-embedding-3-small', env),
        },
        redisUrl: envString('REDIS_URL', 'redis://localhost:6379', env),
        index: {
            name: envString('VECTOR_INDEX_NAME', 'embeddings-index', env),
            prefix: envString('VECTOR_DOC_PREFIX', 'doc', env),
            vectorField: envString('VECTOR_FIELD', 'content_vector', env),
            dimension,
            metric: parseMetric(envString('VECTOR_DISTANCE_METRIC', 'COSINE', env)),
            algorithm: parseAlgorithm(envString('VECTOR_INDEX_ALGORITHM', 'HNSW', env)),
        },
        articlesPath: envOptional('VECTOR_ARTICLES_CSV', env),
        cacheDir: envOptional('CACHE_DIR', env),
    };
}
