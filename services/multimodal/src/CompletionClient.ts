import OpenAI from 'openai';
import { ChatCompletion } from 'openai/resources/chat';
import { ServiceClient, ServiceError, toServiceError } from '@cookbook/shared';
import { CompletionRequest } from './MessageComposer';

export interface TokenUsage {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
}

export interface CompletionResult {
    text: string;
    model: string;
    finishReason: string;
    usage: TokenUsage;
}

/**
 * One call to the OpenAI chat completions endpoint.
 */
export class CompletionClient implements ServiceClient<CompletionRequest, CompletionResult> {
    readonly serviceName = 'OpenAI';

    constructor(private readonly openai: OpenAI) {}

    async send(request: CompletionRequest): Promise<CompletionResult> {
        return this.complete(request);
    }

    async complete(request: CompletionRequest): Promise<CompletionResult> {
        let completion: ChatCompletion;
        try {
            completion = await this.openai.chat.completions.create({
                model: request.model,
                messages: request.messages,
                max_tokens: request.maxTokens,
                temperature: request.temperature,
                ...(request.responseFormat ? { response_format: { type: request.responseFormat } } : {}),
            });
        } catch (error) {
            throw toServiceError(error, this.serviceName);
        }

        const [choice] = completion.choices;
        if (!choice) {
            throw new ServiceError(this.serviceName, 'Completion returned no choices', { category: 'server' });
        }
        return {
            text: choice.message.content ?? '',
            model: completion.model,
            finishReason: choice.finish_reason,
            usage: {
                promptTokens: completion.usage?.prompt_tokens ?? 0,
                completionTokens: completion.usage?.completion_tokens ?? 0,
                totalTokens: completion.usage?.total_tokens ?? 0,
            },
        };
    }
}
