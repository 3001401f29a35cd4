import fs from 'fs/promises';
import OpenAI from 'openai';
import { createClient } from 'redis';
import { DiskCache, loadEnv, Logger, reportError } from '@cookbook/shared';
import { loadVectorSearchConfig } from './config';
import { EmbeddingClient } from './EmbeddingClient';
import { RedisVectorStore } from './RedisVectorStore';
import { VectorSearchRecipe } from './VectorSearchRecipe';
import { loadArticles } from './articles';
import { textFilter } from './filters';

loadEnv();

const logger = new Logger('VectorSearch');

// Usage: main.ts "<query>" ["<phrase the title must contain>"]
async function main(): Promise<void> {
    const [queryText, titlePhrase] = process.argv.slice(2);
    if (!queryText) {
        throw new Error('Usage: main.ts "<query>" ["<title phrase>"]');
    }

    const config = loadVectorSearchConfig();
    const redis = createClient({ url: config.redisUrl });
    redis.on('error', (err: unknown) => reportError(err, logger.createChildLogger('redis')));
    await redis.connect();

    try {
        const recipe = new VectorSearchRecipe({
            embeddings: new EmbeddingClient({
                openai: new OpenAI({ apiKey: config.openai.apiKey, baseURL: config.openai.baseURL }),
                model: config.openai.embeddingModel,
                cache: config.cacheDir ? new DiskCache(config.cacheDir) : undefined,
                logger: logger.createChildLogger('embeddings'),
            }),
            store: new RedisVectorStore(redis, {
                ...config.index,
                fields: { title: 'TEXT', url: 'TEXT', text: 'TEXT' },
            }),
            index: config.index,
            returnFields: ['title', 'url'],
            logger,
        });

        if (config.articlesPath) {
            const documents = loadArticles(await fs.readFile(config.articlesPath, 'utf8'), {
                dimension: config.index.dimension,
                ignoreColumns: ['title_vector', 'vector_id'],
            });
            await recipe.ingest(documents);
        }

        const artifact = await recipe.search(queryText, {
            k: 10,
            filter: titlePhrase ? textFilter('title', titlePhrase) : undefined,
        });
        console.log(artifact.text);
    } finally {
        await redis.quit();
    }
}

main().catch((error: unknown) => {
    reportError(error, logger);
    process.exit(1);
});
