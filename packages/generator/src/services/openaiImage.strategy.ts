// ============================================================================
// OpenAI Image Strategy - DALL-E generation from the full image prompt
// ============================================================================

import OpenAI from 'openai';
import { err, ok } from '@layout-studio/shared';
import { ImageStrategyError, describeError, isAbortError } from './errors.js';
import { requestSignal, type ImageStrategy } from './imageStrategy.js';
import { buildImagePrompt } from './promptBuilder.js';

export const OPENAI_IMAGE_DEFAULTS = {
    model: 'dall-e-3',
    size: '1024x1024',
    quality: 'standard',
} as const;

export interface ImageGenerateRequest {
    model: string;
    prompt: string;
    size: '1024x1024' | '1792x1024' | '1024x1792';
    quality: 'standard' | 'hd';
    n: number;
}

export interface ImageGenerateResponse {
    data?: Array<{ url?: string; b64_json?: string }>;
}

export type ImageGenerateFn = (
    body: ImageGenerateRequest,
    options: { signal?: AbortSignal },
) => Promise<ImageGenerateResponse>;

export interface OpenAIImageOptions {
    apiKey?: string;
    baseURL?: string;
    model?: string;
    size?: ImageGenerateRequest['size'];
    quality?: ImageGenerateRequest['quality'];
    generateImage?: ImageGenerateFn;
}

function createImageGenerate(apiKey: string, baseURL?: string): ImageGenerateFn {
    const client = new OpenAI({ apiKey, baseURL });
    return (body, options) => client.images.generate(body, options);
}

export function createOpenAIImageStrategy(options: OpenAIImageOptions = {}): ImageStrategy {
    return {
        name: 'openai-image',
        async resolve(context) {
            const { description, preferences } = context;
            const apiKey = (options.apiKey || '').trim();
            if (!apiKey && !options.generateImage) {
                return err(new ImageStrategyError('openai-image', 'OPENAI_API_KEY is not configured', { skipped: true }));
            }
            const generate = options.generateImage ?? createImageGenerate(apiKey, options.baseURL);

            try {
                const response = await generate(
                    {
                        model: options.model ?? OPENAI_IMAGE_DEFAULTS.model,
                        prompt: buildImagePrompt(description, preferences),
                        size: options.size ?? OPENAI_IMAGE_DEFAULTS.size,
                        quality: options.quality ?? OPENAI_IMAGE_DEFAULTS.quality,
                        n: 1,
                    },
                    { signal: requestSignal(context) },
                );
                const image = response.data?.[0];
                if (image?.url) return ok(image.url);
                if (image?.b64_json) return ok(`data:image/png;base64,${image.b64_json}`);
                return err(new ImageStrategyError('openai-image', 'response contained no image'));
            } catch (error) {
                return err(new ImageStrategyError('openai-image', `generation failed: ${describeError(error)}`, {
                    cause: error,
                    transient: isAbortError(error),
                }));
            }
        },
    };
}
