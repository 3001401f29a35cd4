import OpenAI from 'openai';
import {
    CachedServiceClient,
    DiskCache,
    Logger,
    ServiceClient,
    loadEnv,
    reportError,
} from '@cookbook/shared';
import { loadMultimodalConfig } from './config';
import { CompletionClient, CompletionResult } from './CompletionClient';
import { CompletionRequest } from './MessageComposer';
import { createCompletionPipeline } from './completionPipeline';
import { ImageClassifier } from './ImageClassifier';
import { ClassificationReportPresenter } from './ClassificationReportPresenter';

loadEnv();

const logger = new Logger('Multimodal');

const USAGE = 'Usage: main.ts describe <image> [prompt] | main.ts classify <image>...';

async function main(): Promise<void> {
    const [command, ...args] = process.argv.slice(2);
    const config = loadMultimodalConfig();

    let client: ServiceClient<CompletionRequest, CompletionResult> = new CompletionClient(
        new OpenAI({ apiKey: config.openai.apiKey, baseURL: config.openai.baseURL })
    );
    if (config.cacheDir) {
        client = new CachedServiceClient(client, new DiskCache(config.cacheDir), logger.createChildLogger('cache'));
    }

    switch (command) {
        case 'describe': {
            const [imagePath, prompt] = args;
            if (!imagePath) {
                throw new Error(USAGE);
            }
            const pipeline = createCompletionPipeline(
                { model: config.openai.model, maxTokens: config.maxTokens, temperature: config.temperature, detail: config.detail },
                client,
                logger
            );
            const { artifact } = await pipeline.run({
                systemPrompt: 'You are a helpful assistant that describes images precisely.',
                text: prompt || 'What is in this image?',
                images: [{ path: imagePath }],
            });
            console.log(artifact);
            break;
        }
        case 'classify': {
            if (args.length === 0) {
                throw new Error(USAGE);
            }
            const classifier = new ImageClassifier({
                client,
                model: config.openai.model,
                labels: config.labels,
                detail: config.detail,
                logger,
            });
            const results = await classifier.classifyAll(args.map(imagePath => ({ path: imagePath })));
            const report = new ClassificationReportPresenter(config.labels).present(results);
            console.log(report.csv);
            console.log(report.chart);
            break;
        }
        default:
            throw new Error(USAGE);
    }
}

main().catch((error: unknown) => {
    reportError(error, logger);
    process.exit(1);
});
