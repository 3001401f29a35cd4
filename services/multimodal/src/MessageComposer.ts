import fs from 'fs/promises';
import path from 'path';
import { ChatCompletionContentPart, ChatCompletionMessageParam } from 'openai/resources/chat';
import { RequestComposer, RequestValidationError } from '@cookbook/shared';

export type ImageDetail = 'auto' | 'low' | 'high';

/** An image on disk, or its bytes with their MIME type */
export type ImageInput = { path: string } | { name?: string; data: Uint8Array; mimeType: string };

export interface MessageInput {
    systemPrompt?: string;
    text?: string;
    images?: ImageInput[];
    /** Overrides the composer's detail level for these images */
    detail?: ImageDetail;
}

export interface CompletionRequest {
    model: string;
    messages: ChatCompletionMessageParam[];
    maxTokens: number;
    temperature: number;
    responseFormat?: 'json_object';
}

export interface MessageComposerOptions {
    model: string;
    maxTokens: number;
    temperature: number;
    detail?: ImageDetail;
    responseFormat?: 'json_object';
}

const MIME_TYPES: Record<string, string> = {
    '.png': 'image/png',
    '.jpg': 'image/jpeg',
    '.jpeg': 'image/jpeg',
    '.gif': 'image/gif',
    '.webp': 'image/webp',
};

const SUPPORTED_MIME_TYPES = new Set(Object.values(MIME_TYPES));

export function mimeTypeFor(filePath: string): string {
    const extension = path.extname(filePath).toLowerCase();
    const mimeType = MIME_TYPES[extension];
    if (!mimeType) {
        throw new RequestValidationError(`Unsupported image type '${extension || filePath}'`, 'images');
    }
    return mimeType;
}

export function toDataUrl(mimeType: string, data: Uint8Array): string {
    return `data:${mimeType};base64,${Buffer.from(data).toString('base64')}`;
}

export function describeImage(image: ImageInput): string {
    return 'path' in image ? image.path : image.name || `${image.mimeType} image`;
}

async function readImage(image: ImageInput): Promise<{ mimeType: string; data: Uint8Array }> {
    if (!('path' in image)) {
        if (!SUPPORTED_MIME_TYPES.has(image.mimeType)) {
            throw new RequestValidationError(`Unsupported image type '${image.mimeType}'`, 'images');
        }
        return image;
    }

    const mimeType = mimeTypeFor(image.path);
    try {
        return { mimeType, data: await fs.readFile(image.path) };
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            throw new RequestValidationError(`Image not found: ${image.path}`, 'images');
        }
        throw error;
    }
}

/**
 * Builds the role-tagged message list: an optional system message, then one user message carrying
 * the text and every image as a base64 data URL.
 */
export class MessageComposer implements RequestComposer<MessageInput, CompletionRequest> {
    constructor(private readonly options: MessageComposerOptions) {}

    async compose(input: MessageInput): Promise<CompletionRequest> {
        const text = input.text?.trim();
        const images = input.images || [];
        if (!text && images.length === 0) {
            throw new RequestValidationError('A message needs text or at least one image', 'text');
        }

        const detail = input.detail || this.options.detail || 'auto';
        const parts: ChatCompletionContentPart[] = [];
        if (text) {
            parts.push({ type: 'text', text });
        }
        for (const image of images) {
            const { mimeType, data } = await readImage(image);
            parts.push({ type: 'image_url', image_url: { url: toDataUrl(mimeType, data), detail } });
        }

        const messages: ChatCompletionMessageParam[] = [];
        const systemPrompt = input.systemPrompt?.trim();
        if (systemPrompt) {
            messages.push({ role: 'system', content: systemPrompt });
        }
        messages.push({ role: 'user', content: images.length === 0 && text ? text : parts });

        const request: CompletionRequest = {
            model: this.options.model,
            messages,
            maxTokens: this.options.maxTokens,
            temperature: this.options.temperature,
        };
        if (this.options.responseFormat) {
            request.responseFormat = this.options.responseFormat;
        }
        return request;
    }
}
