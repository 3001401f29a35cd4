import { ConfigurationError, Env, envFloat, envInt, envOptional, envString, requireEnv } from '@cookbook/shared';
import { ImageDetail } from './MessageComposer';

export interface MultimodalConfig {
    openai: {
        apiKey: string;
        baseURL?: string;
        model: string;
    };
    maxTokens: number;
    temperature: number;
    detail: ImageDetail;
    /** Labels the classifier chooses from */
    labels: string[];
    cacheDir?: string;
}

function parseDetail(value: string): ImageDetail {
    const detail = value.toLowerCase();
    if (detail === 'auto' || detail === 'low' || detail === 'high') {
        return detail;
    }
    throw new ConfigurationError('IMAGE_DETAIL', `IMAGE_DETAIL must be auto, low or high, got "${value}"`);
}

export function loadMultimodalConfig(env: Env = process.env): MultimodalConfig {
    const labels = envString('CLASSIFIER_LABELS', 'cat,dog,bird,other', env)
        .split(',')
        .map(label => label.trim())
        .filter(label => label !== '');
    if (labels.length === 0) {
        throw new ConfigurationError('CLASSIFIER_LABELS', 'CLASSIFIER_LABELS must name at least one label');
    }

    return {
        openai: {
            apiKey: requireEnv('OPENAI_API_KEY', env),
            baseURL: envOptional('OPENAI_BASE_URL', env),
            model: envString('COMPLETION_MODEL', 'gpt-4o', env),
        },
        maxTokens: envInt('COMPLETION_MAX_TOKENS', 300, env),
        temperature: envFloat('COMPLETION_TEMPERATURE', 0, env),
        detail: parseDetail(envString('IMAGE_DETAIL', 'auto', env)),
        labels,
        cacheDir: envOptional('CACHE_DIR', env),
    };
}
