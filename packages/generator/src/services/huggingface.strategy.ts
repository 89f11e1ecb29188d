// ============================================================================
// Hugging Face Strategy - Hosted inference models tried in order
// ============================================================================

import { err, ok } from '@layout-studio/shared';
import { ImageStrategyError, describeError, isAbortError } from './errors.js';
import { discardBody, requestSignal, type FetchFn, type ImageStrategy } from './imageStrategy.js';
import { buildRemoteImagePrompt } from './promptBuilder.js';

export const HUGGINGFACE_INFERENCE_URL = 'https://api-inference.huggingface.co/models/';

export const HUGGINGFACE_DEFAULT_MODELS = [
    'stabilityai/stable-diffusion-xl-base-1.0',
    'runwayml/stable-diffusion-v1-5',
    'stabilityai/stable-diffusion-2-1',
    'CompVis/stable-diffusion-v1-4',
] as const;

export const HUGGINGFACE_DEFAULT_PARAMETERS = {
    num_inference_steps: 25,
    guidance_scale: 7.5,
};

export interface HuggingFaceOptions {
    apiKey?: string;
    models?: readonly string[];
    baseUrl?: string;
    parameters?: Record<string, number>;
    fetchImpl?: FetchFn;
}

// 503 means the model is still loading on the inference side.
function isTransientStatus(status: number): boolean {
    return status === 503;
}

export function createHuggingFaceStrategy(options: HuggingFaceOptions = {}): ImageStrategy {
    const fetchImpl = options.fetchImpl ?? fetch;
    const models = options.models && options.models.length > 0 ? options.models : HUGGINGFACE_DEFAULT_MODELS;
    const baseUrl = options.baseUrl ?? HUGGINGFACE_INFERENCE_URL;

    return {
        name: 'huggingface',
        async resolve(context) {
            const { description, preferences, signal, logger } = context;
            const apiKey = (options.apiKey || '').trim();
            if (!apiKey) {
                return err(new ImageStrategyError('huggingface', 'HUGGINGFACE_API_KEY is not configured', { skipped: true }));
            }

            const body = JSON.stringify({
                inputs: buildRemoteImagePrompt(description, preferences),
                parameters: options.parameters ?? HUGGINGFACE_DEFAULT_PARAMETERS,
            });
            let sawTransient = false;

            // Each model gets its own timeout; only caller cancellation ends the loop early.
            const abortedBy = (model: string, error: unknown) => err(
                new ImageStrategyError('huggingface', `aborted while calling ${model}`, { cause: error, transient: true }),
            );

            for (const model of models) {
                let response: Response;
                try {
                    response = await fetchImpl(`${baseUrl}${model}`, {
                        method: 'POST',
                        headers: {
                            Authorization: `Bearer ${apiKey}`,
                            'Content-Type': 'application/json',
                            Accept: 'image/png',
                        },
                        body,
                        signal: requestSignal(context),
                    });
                } catch (error) {
                    if (signal.aborted) return abortedBy(model, error);
                    sawTransient = sawTransient || isAbortError(error);
                    logger.warn({ model, reason: describeError(error) }, 'huggingface: request failed');
                    continue;
                }

                if (isTransientStatus(response.status)) {
                    sawTransient = true;
                    await discardBody(response, logger, 'huggingface');
                    logger.debug({ model, status: response.status }, 'huggingface: model unavailable, trying next');
                    continue;
                }
                if (!response.ok) {
                    await discardBody(response, logger, 'huggingface');
                    logger.warn({ model, status: response.status }, 'huggingface: model failed');
                    continue;
                }

                const contentType = (response.headers.get('content-type') || '').split(';')[0].trim();
                if (!contentType.startsWith('image/')) {
                    await discardBody(response, logger, 'huggingface');
                    logger.warn({ model, contentType }, 'huggingface: response is not an image');
                    continue;
                }

                let bytes: Buffer;
                try {
                    bytes = Buffer.from(await response.arrayBuffer());
                } catch (error) {
                    if (signal.aborted) return abortedBy(model, error);
                    sawTransient = sawTransient || isAbortError(error);
                    logger.warn({ model, reason: describeError(error) }, 'huggingface: reading image failed');
                    continue;
                }
                if (bytes.length === 0) {
                    logger.warn({ model }, 'huggingface: empty image payload');
                    continue;
                }
                logger.info({ model, bytes: bytes.length }, 'huggingface: image generated');
                return ok(`data:${contentType};base64,${bytes.toString('base64')}`);
            }

            return err(new ImageStrategyError('huggingface', `all ${models.length} models failed`, { transient: sawTransient }));
        },
    };
}
