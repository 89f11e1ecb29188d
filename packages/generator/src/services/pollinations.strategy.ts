// ============================================================================
// Pollinations Strategy - Free-tier text-to-image service addressed by URL
// ============================================================================

import { err, ok } from '@layout-studio/shared';
import { ImageStrategyError, describeError, isAbortError } from './errors.js';
import { discardBody, requestSignal, type FetchFn, type ImageStrategy } from './imageStrategy.js';
import { buildRemoteImagePrompt } from './promptBuilder.js';

export const POLLINATIONS_BASE_URL = 'https://image.pollinations.ai/prompt/';

export interface PollinationsOptions {
    baseUrl?: string;
    width?: number;
    height?: number;
    model?: string;
    fetchImpl?: FetchFn;
}

export function buildPollinationsUrl(prompt: string, options: PollinationsOptions = {}): string {
    const params = new URLSearchParams({
        width: String(options.width ?? 1024),
        height: String(options.height ?? 1024),
        model: options.model ?? 'flux',
        enhance: 'true',
    });
    return `${options.baseUrl ?? POLLINATIONS_BASE_URL}${encodeURIComponent(prompt)}?${params.toString()}`;
}

export function createPollinationsStrategy(options: PollinationsOptions = {}): ImageStrategy {
    const fetchImpl = options.fetchImpl ?? fetch;

    return {
        name: 'pollinations',
        async resolve(context) {
            const { description, preferences, logger } = context;
            const url = buildPollinationsUrl(buildRemoteImagePrompt(description, preferences), options);

            let response: Response;
            try {
                response = await fetchImpl(url, { method: 'GET', signal: requestSignal(context) });
            } catch (error) {
                return err(new ImageStrategyError('pollinations', `request failed: ${describeError(error)}`, {
                    cause: error,
                    transient: isAbortError(error),
                }));
            }

            // The image is rendered on the first request; the URL itself is the reference.
            await discardBody(response, logger, 'pollinations');

            if (!response.ok) {
                return err(new ImageStrategyError('pollinations', `HTTP ${response.status}`, {
                    status: response.status,
                    transient: response.status === 429 || response.status >= 500,
                }));
            }
            const contentType = response.headers.get('content-type') || '';
            if (!contentType.startsWith('image/')) {
                return err(new ImageStrategyError('pollinations', `unexpected content-type "${contentType}"`));
            }
            return ok(url);
        },
    };
}
