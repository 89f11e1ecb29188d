import type { ImageStrategyName, PreferenceSet, Result } from '@layout-studio/shared';
import { describeError, type ImageStrategyError } from './errors.js';
import type { Logger } from './logger.js';

export interface ImageStrategyContext {
    description: string;
    preferences: PreferenceSet;
    /** Caller cancellation only; each outbound request adds its own timeout via `requestSignal`. */
    signal: AbortSignal;
    timeoutMs: number;
    logger: Logger;
}

export interface ImageStrategy {
    readonly name: ImageStrategyName;
    resolve(context: ImageStrategyContext): Promise<Result<string, ImageStrategyError>>;
}

export type ImageStrategyRegistry = Partial<Record<ImageStrategyName, ImageStrategy>>;

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

/** Signal for one network call: aborts on caller cancellation or after `timeoutMs`. */
export function requestSignal(context: Pick<ImageStrategyContext, 'signal' | 'timeoutMs'>): AbortSignal {
    return AbortSignal.any([context.signal, AbortSignal.timeout(context.timeoutMs)]);
}

// Releases the connection of a response whose body is not going to be read.
export async function discardBody(response: Response, logger: Logger, strategy: ImageStrategyName): Promise<void> {
    await response.body?.cancel().catch((error: unknown) => {
        logger.debug({ strategy, reason: describeError(error) }, 'image-strategy: body discard failed');
    });
}
