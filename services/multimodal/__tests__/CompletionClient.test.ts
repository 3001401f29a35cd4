import OpenAI from 'openai';
import { CompletionClient } from '../src/CompletionClient';
import { CompletionRequest } from '../src/MessageComposer';
import { ServiceError } from '@cookbook/shared';

describe('CompletionClient', () => {
    let create: jest.Mock;
    let client: CompletionClient;

    const request: CompletionRequest = {
        model: 'gpt-4o',
        messages: [{ role: 'user', content: 'Describe a cat in two words.' }],
        maxTokens: 300,
        temperature: 0,
    };

    const completion = {
        id: 'chatcmpl-1',
        object: 'chat.completion',
        created: 0,
        model: 'gpt-4o-2024-05-13',
        choices: [{ index: 0, finish_reason: 'stop', message: { role: 'assistant', content: 'Small. Fluffy.' } }],
        usage: { prompt_tokens: 120, completion_tokens: 3, total_tokens: 123 },
    };

    beforeEach(() => {
        create = jest.fn();
        client = new CompletionClient({ chat: { completions: { create } } } as unknown as OpenAI);
    });

    it('should return the generated text with token usage', async () => {
        create.mockResolvedValue(completion);

        await expect(client.complete(request)).resolves.toEqual({
            text: 'Small. Fluffy.',
            model: 'gpt-4o-2024-05-13',
            finishReason: 'stop',
            usage: { promptTokens: 120, completionTokens: 3, totalTokens: 123 },
        });
        expect(create).toHaveBeenCalledWith({
            model: 'gpt-4o',
            messages: request.messages,
            max_tokens: 300,
            temperature: 0,
        });
    });

    it('should request JSON output when asked to', async () => {
        create.mockResolvedValue(completion);

        await client.send({ ...request, responseFormat: 'json_object' });

        expect(create.mock.calls[0][0].response_format).toEqual({ type: 'json_object' });
    });

    it('should default missing content and usage', async () => {
        create.mockResolvedValue({ ...completion, choices: [{ ...completion.choices[0], message: { role: 'assistant', content: null } }], usage: undefined });

        const result = await client.complete(request);

        expect(result.text).toBe('');
        expect(result.usage).toEqual({ promptTokens: 0, completionTokens: 0, totalTokens: 0 });
    });

    it('should fail when there is no choice', async () => {
        create.mockResolvedValue({ ...completion, choices: [] });
        await expect(client.complete(request)).rejects.toMatchObject({ category: 'server', message: 'Completion returned no choices' });
    });

    it.each([
        [400, 'client'],
        [401, 'auth'],
        [429, 'rate_limit'],
        [500, 'server'],
    ])('should map status %p to a %s error', async (status, category) => {
        create.mockRejectedValue(Object.assign(new Error('request failed'), { status }));

        const failure = await client.complete(request).catch((error: unknown) => error);

        expect(failure).toBeInstanceOf(ServiceError);
        expect(failure).toMatchObject({ service: 'OpenAI', status, category });
    });

    it('should treat a connection failure as a network error', async () => {
        create.mockRejectedValue(new Error('Connection error.'));
        await expect(client.complete(request)).rejects.toMatchObject({ category: 'network', message: 'OpenAI request failed: Connection error.' });
    });
});
