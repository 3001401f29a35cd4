import { Logger, Pipeline, ResponsePresenter, ServiceClient } from '@cookbook/shared';
import { CompletionRequest, MessageComposer, MessageComposerOptions, MessageInput } from './MessageComposer';
import { CompletionResult } from './CompletionClient';

/**
 * Console rendering of a completion: the generated text followed by its token usage.
 */
export class CompletionTextPresenter implements ResponsePresenter<CompletionResult, string> {
    present(result: CompletionResult): string {
        const { promptTokens, completionTokens, totalTokens } = result.usage;
        return `${result.text}\n\n[${result.model}, ${result.finishReason}] tokens: ${promptTokens} prompt + ${completionTokens} completion = ${totalTokens}`;
    }
}

export function createCompletionPipeline(
    composer: MessageComposerOptions,
    client: ServiceClient<CompletionRequest, CompletionResult>,
    logger?: Logger
): Pipeline<MessageInput, CompletionRequest, CompletionResult, string> {
    return new Pipeline(new MessageComposer(composer), client, new CompletionTextPresenter(), { logger });
}
