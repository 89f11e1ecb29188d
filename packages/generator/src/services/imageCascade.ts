// ============================================================================
// Image Resolution Cascade - First successful strategy wins, curated table last
// ============================================================================

import {
    err,
    type ImageStrategyName,
    type PreferenceSet,
    type Result,
} from '@layout-studio/shared';
import {
    createCuratedStrategy,
    selectCuratedImage,
    type CuratedLookupOptions,
} from './curatedImages.js';
import { ImageStrategyError, describeError } from './errors.js';
import { createHuggingFaceStrategy, type HuggingFaceOptions } from './huggingface.strategy.js';
import type { FetchFn, ImageStrategy, ImageStrategyRegistry } from './imageStrategy.js';
import { createLexicaStrategy, type LexicaOptions } from './lexica.strategy.js';
import { defaultLogger, type Logger } from './logger.js';
import { createOpenAIImageStrategy, type OpenAIImageOptions } from './openaiImage.strategy.js';
import { createPollinationsStrategy, type PollinationsOptions } from './pollinations.strategy.js';

export const MAX_IMAGE_TIMEOUT_MS = 60_000;

export const DEFAULT_IMAGE_STRATEGY_ORDER: readonly ImageStrategyName[] = ['pollinations', 'huggingface', 'curated'];

export interface ImageCandidate {
    strategyName: ImageStrategyName;
    urlOrData?: string;
    succeeded: boolean;
}

export type CascadeState =
    | { status: 'not-started' }
    | { status: 'trying'; index: number; strategy: ImageStrategyName }
    | { status: 'succeeded'; strategy: ImageStrategyName; reference: string }
    | { status: 'exhausted-fallback'; reference: string };

export interface ImageStrategyConfig {
    pollinations?: Omit<PollinationsOptions, 'fetchImpl'>;
    huggingface?: Omit<HuggingFaceOptions, 'fetchImpl'>;
    lexica?: Omit<LexicaOptions, 'fetchImpl'>;
    openaiImage?: OpenAIImageOptions;
    curated?: CuratedLookupOptions;
    fetchImpl?: FetchFn;
}

export function createImageStrategies(config: ImageStrategyConfig = {}): ImageStrategyRegistry {
    const fetchImpl = config.fetchImpl;
    return {
        pollinations: createPollinationsStrategy({ ...config.pollinations, fetchImpl }),
        huggingface: createHuggingFaceStrategy({ ...config.huggingface, fetchImpl }),
        lexica: createLexicaStrategy({ ...config.lexica, fetchImpl }),
        'openai-image': createOpenAIImageStrategy(config.openaiImage),
        curated: createCuratedStrategy(config.curated),
    };
}

export interface ResolveImageOptions {
    strategies?: ImageStrategyRegistry;
    curated?: CuratedLookupOptions;
    timeoutMs?: number;
    signal?: AbortSignal;
    logger?: Logger;
    onAttempt?: (candidate: ImageCandidate) => void;
    onTransition?: (state: CascadeState) => void;
}

export interface ImageResolution {
    reference: string;
    strategy: ImageStrategyName;
    fallback: boolean;
    candidates: ImageCandidate[];
}

export function clampImageTimeout(timeoutMs: number | undefined): number {
    if (timeoutMs === undefined || !Number.isFinite(timeoutMs) || timeoutMs <= 0) return MAX_IMAGE_TIMEOUT_MS;
    return Math.min(MAX_IMAGE_TIMEOUT_MS, Math.floor(timeoutMs));
}

async function runStrategy(
    strategy: ImageStrategy,
    context: Parameters<ImageStrategy['resolve']>[0],
): Promise<Result<string, ImageStrategyError>> {
    try {
        return await strategy.resolve(context);
    } catch (error) {
        return err(new ImageStrategyError(strategy.name, `unexpected failure: ${describeError(error)}`, { cause: error }));
    }
}

function logStrategyFailure(logger: Logger, error: ImageStrategyError): void {
    const details = { strategy: error.strategy, status: error.status, reason: error.message };
    if (error.skipped || error.transient) {
        logger.debug(details, 'resolve-image: strategy skipped or unavailable');
    } else {
        logger.warn(details, 'resolve-image: strategy failed');
    }
}

/**
 * Tries each strategy in `strategyOrder` sequentially; every request a strategy
 * makes is bounded by `timeoutMs`. Never rejects: when every strategy fails (or
 * the caller aborts) the curated table supplies the image.
 */
export async function resolveImageDetailed(
    description: string,
    prefs: PreferenceSet,
    strategyOrder: readonly ImageStrategyName[] = DEFAULT_IMAGE_STRATEGY_ORDER,
    options: ResolveImageOptions = {},
): Promise<ImageResolution> {
    const logger = (options.logger ?? defaultLogger).child({ component: 'image-cascade' });
    const strategies = options.strategies ?? createImageStrategies({ curated: options.curated });
    const timeoutMs = clampImageTimeout(options.timeoutMs);
    const callerSignal = options.signal ?? new AbortController().signal;
    const candidates: ImageCandidate[] = [];

    const record = (candidate: ImageCandidate) => {
        candidates.push(candidate);
        options.onAttempt?.(candidate);
    };
    const transition = (state: CascadeState) => options.onTransition?.(state);

    transition({ status: 'not-started' });

    for (const [index, name] of strategyOrder.entries()) {
        if (callerSignal.aborted) {
            logger.debug({ strategy: name }, 'resolve-image: aborted by caller');
            break;
        }
        transition({ status: 'trying', index, strategy: name });

        const strategy = strategies[name];
        if (!strategy) {
            logger.debug({ strategy: name }, 'resolve-image: strategy not registered');
            record({ strategyName: name, succeeded: false });
            continue;
        }

        const result = await runStrategy(strategy, {
            description,
            preferences: prefs,
            signal: callerSignal,
            timeoutMs,
            logger,
        });

        if (result.ok && result.value) {
            record({ strategyName: name, urlOrData: result.value, succeeded: true });
            transition({ status: 'succeeded', strategy: name, reference: result.value });
            return { reference: result.value, strategy: name, fallback: false, candidates };
        }

        record({ strategyName: name, succeeded: false });
        if (!result.ok) logStrategyFailure(logger, result.error);
    }

    const reference = selectCuratedImage(prefs, options.curated);
    transition({ status: 'exhausted-fallback', reference });
    logger.debug({ attempts: candidates.length }, 'resolve-image: using curated fallback');
    return { reference, strategy: 'curated', fallback: true, candidates };
}

export async function resolveImage(
    description: string,
    prefs: PreferenceSet,
    strategyOrder: readonly ImageStrategyName[] = DEFAULT_IMAGE_STRATEGY_ORDER,
    options: ResolveImageOptions = {},
): Promise<string> {
    const resolution = await resolveImageDetailed(description, prefs, strategyOrder, options);
    return resolution.reference;
}
