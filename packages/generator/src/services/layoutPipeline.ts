// ============================================================================
// Layout Pipeline - Preferences in, illustrated layout results out
// ============================================================================

import { v4 as uuidv4 } from 'uuid';
import {
    PreferenceSetSchema,
    type GenerationResult,
    type ImageStrategyName,
    type PreferenceSet,
    type PreferenceSetInput,
} from '@layout-studio/shared';
import type { CuratedLookupOptions } from './curatedImages.js';
import { PreferenceValidationError, type TextGenerationError } from './errors.js';
import {
    DEFAULT_IMAGE_STRATEGY_ORDER,
    resolveImageDetailed,
} from './imageCascade.js';
import type { ImageStrategyRegistry } from './imageStrategy.js';
import { validatePreferences } from './layoutExport.js';
import { deriveLayoutTitle, parseLayouts } from './layoutParser.js';
import { defaultLogger, type Logger } from './logger.js';
import { buildLayoutPrompt, clampLayoutCount } from './promptBuilder.js';
import { generateText, type TextProviderClients, type TextProviderConfig } from './textGeneration.js';

export const DEFAULT_IMAGE_CONCURRENCY = 2;
const MAX_IMAGE_CONCURRENCY = 6;

export interface LayoutGenerationOptions {
    provider: TextProviderConfig;
    /** Number of layouts to request and keep (1-5). */
    layoutCount?: number;
    imageStrategyOrder?: readonly ImageStrategyName[];
    imageStrategies?: ImageStrategyRegistry;
    curated?: CuratedLookupOptions;
    imageTimeoutMs?: number;
    concurrency?: number;
    signal?: AbortSignal;
    logger?: Logger;
    textClients?: TextProviderClients;
    now?: () => Date;
    createId?: () => string;
}

export type LayoutGenerationOutcome =
    | { ok: true; results: GenerationResult[] }
    | { ok: false; reason: string; error: TextGenerationError };

async function mapWithConcurrency<T, R>(
    items: readonly T[],
    concurrency: number,
    fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
    const results = new Array<R>(items.length);
    if (!items.length) return results;
    const limit = Math.max(1, concurrency);
    let cursor = 0;
    const workers = new Array<number>(Math.min(limit, items.length)).fill(0).map(async () => {
        while (true) {
            const index = cursor;
            cursor += 1;
            if (index >= items.length) break;
            results[index] = await fn(items[index], index);
        }
    });
    await Promise.all(workers);
    return results;
}

function freezePreferences(input: PreferenceSetInput): PreferenceSet {
    const parsed = PreferenceSetSchema.safeParse(input);
    if (!parsed.success) {
        const issues = validatePreferences(input);
        throw new PreferenceValidationError(
            issues.length > 0 ? issues : parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        );
    }
    const prefs = parsed.data;
    Object.freeze(prefs.colors);
    Object.freeze(prefs.features);
    return Object.freeze(prefs);
}

/**
 * Throws PreferenceValidationError for records missing a required field.
 * Text generation failures come back as `{ ok: false }`; image failures are
 * absorbed by the cascade.
 */
export async function generateLayouts(
    input: PreferenceSetInput,
    options: LayoutGenerationOptions,
): Promise<LayoutGenerationOutcome> {
    const logger = (options.logger ?? defaultLogger).child({ component: 'layout-pipeline' });
    const prefs = freezePreferences(input);
    const layoutCount = clampLayoutCount(options.layoutCount);
    const now = options.now ?? (() => new Date());
    const createId = options.createId ?? uuidv4;

    logger.info(
        { provider: options.provider.provider, roomType: prefs.roomType, style: prefs.style, layoutCount },
        'generate-layouts: start',
    );

    const text = await generateText(buildLayoutPrompt(prefs, layoutCount), options.provider, {
        signal: options.signal,
        logger: options.logger,
        clients: options.textClients,
    });
    if (!text.ok) {
        return { ok: false, reason: text.error.message, error: text.error };
    }

    const descriptions = parseLayouts(text.value).slice(0, layoutCount);
    if (descriptions.length === 0) {
        logger.warn('generate-layouts: provider returned no layouts');
        return { ok: true, results: [] };
    }

    const concurrency = Math.max(1, Math.min(MAX_IMAGE_CONCURRENCY, options.concurrency ?? DEFAULT_IMAGE_CONCURRENCY));
    const results = await mapWithConcurrency(descriptions, concurrency, async (description, index) => {
        const image = await resolveImageDetailed(
            description,
            prefs,
            options.imageStrategyOrder ?? DEFAULT_IMAGE_STRATEGY_ORDER,
            {
                strategies: options.imageStrategies,
                curated: options.curated,
                timeoutMs: options.imageTimeoutMs,
                signal: options.signal,
                logger: options.logger,
            },
        );

        const result: GenerationResult = {
            id: createId(),
            title: deriveLayoutTitle(description, index),
            description,
            imageReference: image.reference,
            sourcePreferences: prefs,
            generatedAt: now().toISOString(),
            providerUsed: options.provider.provider,
        };
        return Object.freeze(result);
    });

    logger.info({ layouts: results.length }, 'generate-layouts: complete');
    return { ok: true, results };
}
