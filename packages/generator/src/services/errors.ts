// ============================================================================
// Errors - Failure types raised or returned by the generation pipeline
// ============================================================================

import type { ImageStrategyName, TextProviderName } from '@layout-studio/shared';

export function describeError(error: unknown): string {
    if (error instanceof Error) return error.message;
    if (typeof error === 'string') return error;
    return String(error);
}

export function isAbortError(error: unknown): boolean {
    return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

const PROVIDER_LABELS: Record<TextProviderName, string> = {
    gemini: 'Gemini',
    openai: 'OpenAI',
};

/** Returned (never thrown) by the text dispatcher; the caller picks the next step. */
export class TextGenerationError extends Error {
    readonly provider: TextProviderName;

    constructor(provider: TextProviderName, cause: unknown) {
        super(`${PROVIDER_LABELS[provider]} generation error: ${describeError(cause)}`, { cause });
        this.name = 'TextGenerationError';
        this.provider = provider;
    }
}

export interface ImageStrategyErrorOptions {
    cause?: unknown;
    status?: number;
    transient?: boolean;
    skipped?: boolean;
}

/** Internal to the image cascade; absorbed and logged, never surfaced to callers. */
export class ImageStrategyError extends Error {
    readonly strategy: ImageStrategyName;
    readonly status?: number;
    readonly transient: boolean;
    readonly skipped: boolean;

    constructor(strategy: ImageStrategyName, message: string, options: ImageStrategyErrorOptions = {}) {
        super(`${strategy}: ${message}`, { cause: options.cause });
        this.name = 'ImageStrategyError';
        this.strategy = strategy;
        this.status = options.status;
        this.transient = options.transient ?? false;
        this.skipped = options.skipped ?? false;
    }
}

export class PreferenceValidationError extends Error {
    readonly issues: string[];

    constructor(issues: string[]) {
        super(`Invalid preferences: ${issues.join('; ')}`);
        this.name = 'PreferenceValidationError';
        this.issues = issues;
    }
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}
