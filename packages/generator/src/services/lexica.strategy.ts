// ============================================================================
// Lexica Strategy - Searches an existing generated-image index
// ============================================================================

import { z } from 'zod';
import { err, ok } from '@layout-studio/shared';
import { ImageStrategyError, describeError, isAbortError } from './errors.js';
import { discardBody, requestSignal, type FetchFn, type ImageStrategy } from './imageStrategy.js';
import { buildSearchQuery } from './promptBuilder.js';

export const LEXICA_SEARCH_URL = 'https://lexica.art/api/v1/search';

const LexicaSearchResponseSchema = z.object({
    images: z.array(z.object({ src: z.string().url() })).default([]),
});

export interface LexicaOptions {
    searchUrl?: string;
    fetchImpl?: FetchFn;
}

export function createLexicaStrategy(options: LexicaOptions = {}): ImageStrategy {
    const fetchImpl = options.fetchImpl ?? fetch;

    return {
        name: 'lexica',
        async resolve(context) {
            const { preferences, logger } = context;
            const url = `${options.searchUrl ?? LEXICA_SEARCH_URL}?q=${encodeURIComponent(buildSearchQuery(preferences))}`;
            try {
                const response = await fetchImpl(url, { method: 'GET', signal: requestSignal(context) });
                if (!response.ok) {
                    await discardBody(response, logger, 'lexica');
                    return err(new ImageStrategyError('lexica', `HTTP ${response.status}`, {
                        status: response.status,
                        transient: response.status === 429 || response.status >= 500,
                    }));
                }
                const parsed = LexicaSearchResponseSchema.safeParse(await response.json());
                if (!parsed.success) {
                    return err(new ImageStrategyError('lexica', 'unexpected search response shape', { cause: parsed.error }));
                }
                const first = parsed.data.images[0];
                if (!first) return err(new ImageStrategyError('lexica', 'no images matched'));
                return ok(first.src);
            } catch (error) {
                return err(new ImageStrategyError('lexica', `request failed: ${describeError(error)}`, {
                    cause: error,
                    transient: isAbortError(error),
                }));
            }
        },
    };
}
