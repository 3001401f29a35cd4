import OpenAI from 'openai';
import {
    CachedServiceClient,
    DiskCache,
    Logger,
    RequestValidationError,
    ServiceClient,
    ServiceError,
    toServiceError,
} from '@cookbook/shared';

export interface EmbeddingRequest {
    model: string;
    input: string[];
}

/** One vector per input, in input order */
export type EmbeddingResponse = number[][];

/**
 * A single call to the OpenAI embeddings endpoint.
 */
export class OpenAIEmbeddingsClient implements ServiceClient<EmbeddingRequest, EmbeddingResponse> {
    readonly serviceName = 'OpenAI';

    constructor(private readonly openai: OpenAI) {}

    async send(request: EmbeddingRequest): Promise<EmbeddingResponse> {
        try {
            const response = await this.openai.embeddings.create({ model: request.model, input: request.input });
            return [...response.data].sort((a, b) => a.index - b.index).map(item => item.embedding);
        } catch (error) {
            throw toServiceError(error, this.serviceName);
        }
    }
}

export interface EmbeddingClientOptions {
    openai: OpenAI;
    model: string;
    /** Answers repeated texts from disk instead of calling the API again */
    cache?: DiskCache;
    logger?: Logger;
}

/**
 * Turns text into embedding vectors. Empty text is rejected before anything is sent.
 */
export class EmbeddingClient {
    private readonly client: ServiceClient<EmbeddingRequest, EmbeddingResponse>;
    private readonly model: string;
    private readonly logger: Logger;

    constructor(options: EmbeddingClientOptions) {
        this.model = options.model;
        this.logger = options.logger || new Logger('EmbeddingClient');
        const client = new OpenAIEmbeddingsClient(options.openai);
        this.client = options.cache
            ? new CachedServiceClient(client, options.cache, this.logger.createChildLogger('cache'))
            : client;
    }

    async embedMany(texts: string[]): Promise<number[][]> {
        if (texts.length === 0) {
            throw new RequestValidationError('At least one text is required', 'texts');
        }
        texts.forEach((text, index) => {
            if (typeof text !== 'string' || text.trim() === '') {
                throw new RequestValidationError(`Text ${index} is empty`, 'texts');
            }
        });

        const vectors = await this.client.send({ model: this.model, input: texts });
        if (vectors.length !== texts.length) {
            throw new ServiceError(this.client.serviceName, `Expected ${texts.length} embeddings, got ${vectors.length}`, {
                category: 'server',
            });
        }
        this.logger.debug('Embedded texts', { count: texts.length, model: this.model });
        return vectors;
    }

    async embed(text: string): Promise<number[]> {
        if (typeof text !== 'string' || text.trim() === '') {
            throw new RequestValidationError('Text to embed must not be empty', 'text');
        }
        const [vector] = await this.embedMany([text]);
        return vector;
    }
}
