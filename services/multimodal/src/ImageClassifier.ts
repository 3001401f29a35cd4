import { Logger, Pipeline, RequestComposer, ResponsePresenter, ServiceClient, ServiceError } from '@cookbook/shared';
import { CompletionRequest, ImageDetail, ImageInput, MessageComposer, describeImage } from './MessageComposer';
import { CompletionResult, TokenUsage } from './CompletionClient';

export interface ClassificationResult {
    image: string;
    label: string;
    usage: TokenUsage;
}

export interface ImageClassifierOptions {
    client: ServiceClient<CompletionRequest, CompletionResult>;
    model: string;
    labels: string[];
    maxTokens?: number;
    detail?: ImageDetail;
    logger?: Logger;
}

export function classificationPrompt(labels: ReadonlyArray<string>): string {
    return `Classify the image into exactly one of these labels: ${labels.join(', ')}. `
        + 'Respond with a JSON object of the form {"label": "<label>"} and nothing else.';
}

class ClassificationComposer implements RequestComposer<ImageInput, CompletionRequest> {
    constructor(private readonly messages: MessageComposer, private readonly labels: string[]) {}

    compose(image: ImageInput): Promise<CompletionRequest> {
        return this.messages.compose({ systemPrompt: classificationPrompt(this.labels), images: [image] });
    }
}

/**
 * Checks the model's answer against the label set. A label outside the set, or an answer that is
 * not a JSON object with a string `label`, is a client error.
 */
export class LabelPresenter implements ResponsePresenter<CompletionResult, { label: string; usage: TokenUsage }> {
    constructor(private readonly serviceName: string, private readonly labels: string[]) {}

    present(result: CompletionResult): { label: string; usage: TokenUsage } {
        let answer: unknown;
        try {
            answer = JSON.parse(result.text);
        } catch {
            throw new ServiceError(this.serviceName, `Classification answer is not JSON: ${result.text}`, {
                category: 'client',
                details: { text: result.text },
            });
        }

        const raw = typeof answer === 'object' && answer !== null && 'label' in answer ? answer.label : undefined;
        const label = typeof raw === 'string'
            ? this.labels.find(candidate => candidate.toLowerCase() === raw.trim().toLowerCase())
            : undefined;
        if (!label) {
            throw new ServiceError(this.serviceName, `Unknown label ${JSON.stringify(raw ?? null)}, expected one of ${this.labels.join(', ')}`, {
                category: 'client',
                details: { text: result.text },
            });
        }
        return { label, usage: result.usage };
    }
}

/**
 * Labels images with a multimodal completion model constrained to JSON output.
 */
export class ImageClassifier {
    readonly labels: string[];
    private readonly logger: Logger;
    private readonly pipeline: Pipeline<ImageInput, CompletionRequest, CompletionResult, { label: string; usage: TokenUsage }>;

    constructor(options: ImageClassifierOptions) {
        if (options.labels.length === 0) {
            throw new Error('ImageClassifier needs at least one label');
        }
        this.labels = [...options.labels];
        this.logger = options.logger || new Logger('ImageClassifier');
        const messages = new MessageComposer({
            model: options.model,
            maxTokens: options.maxTokens ?? 50,
            temperature: 0,
            detail: options.detail || 'low',
            responseFormat: 'json_object',
        });
        this.pipeline = new Pipeline(
            new ClassificationComposer(messages, this.labels),
            options.client,
            new LabelPresenter(options.client.serviceName, this.labels),
            { logger: this.logger }
        );
    }

    async classify(image: ImageInput): Promise<ClassificationResult> {
        const { artifact } = await this.pipeline.run(image);
        const name = describeImage(image);
        this.logger.info(`${name} classified as ${artifact.label}`, { totalTokens: artifact.usage.totalTokens });
        return { image: name, label: artifact.label, usage: artifact.usage };
    }

    /**
     * Classifies one image after the other; the first failure stops the run.
     */
    async classifyAll(images: ReadonlyArray<ImageInput>): Promise<ClassificationResult[]> {
        const results: ClassificationResult[] = [];
        for (const image of images) {
            results.push(await this.classify(image));
        }
        return results;
    }
}
