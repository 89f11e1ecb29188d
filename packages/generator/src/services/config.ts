// ============================================================================
// Config - Caller-side environment loading for the generation pipeline
// ============================================================================

import path from 'path';
import fs from 'fs';
import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ImageStrategyNameSchema, TextProviderNameSchema, type ImageStrategyName } from '@layout-studio/shared';
import { ConfigError } from './errors.js';
import { GEMINI_DEFAULT_MODEL } from './gemini.provider.js';
import { HUGGINGFACE_DEFAULT_MODELS } from './huggingface.strategy.js';
import { createImageStrategies, DEFAULT_IMAGE_STRATEGY_ORDER, MAX_IMAGE_TIMEOUT_MS, type ImageStrategyConfig } from './imageCascade.js';
import type { LayoutGenerationOptions } from './layoutPipeline.js';
import { createLogger, type Logger } from './logger.js';
import { OPENAI_DEFAULT_MODEL } from './openai.provider.js';
import { MAX_LAYOUTS_PER_REQUEST } from './promptBuilder.js';
import type { TextProviderConfig } from './textGeneration.js';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

function emptyToUndefined(value: unknown): unknown {
    if (typeof value === 'string' && value.trim() === '') return undefined;
    return value;
}

function splitList(value: string): string[] {
    return value
        .split(',')
        .map((item) => item.trim())
        .filter(Boolean);
}

const optionalText = z.preprocess(emptyToUndefined, z.string().trim().optional());

const EnvSchema = z.object({
    TEXT_PROVIDER: z.preprocess(emptyToUndefined, TextProviderNameSchema.default('gemini')),
    GEMINI_API_KEY: optionalText,
    GEMINI_MODEL: z.preprocess(emptyToUndefined, z.string().trim().default(GEMINI_DEFAULT_MODEL)),
    OPENAI_API_KEY: optionalText,
    OPENAI_MODEL: z.preprocess(emptyToUndefined, z.string().trim().default(OPENAI_DEFAULT_MODEL)),
    OPENAI_BASE_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),
    HUGGINGFACE_API_KEY: optionalText,
    HUGGINGFACE_MODELS: z.preprocess(
        emptyToUndefined,
        z.string().default(HUGGINGFACE_DEFAULT_MODELS.join(',')),
    ).transform(splitList),
    IMAGE_STRATEGIES: z.preprocess(
        emptyToUndefined,
        z.string().default(DEFAULT_IMAGE_STRATEGY_ORDER.join(',')),
    ).transform(splitList).pipe(z.array(ImageStrategyNameSchema).min(1)),
    IMAGE_TIMEOUT_MS: z.preprocess(
        emptyToUndefined,
        z.coerce.number().int().positive().max(MAX_IMAGE_TIMEOUT_MS).default(MAX_IMAGE_TIMEOUT_MS),
    ),
    LAYOUT_COUNT: z.preprocess(
        emptyToUndefined,
        z.coerce.number().int().min(1).max(MAX_LAYOUTS_PER_REQUEST).default(1),
    ),
    LOG_LEVEL: z.preprocess(emptyToUndefined, z.enum(LOG_LEVELS).default('info')),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface GeneratorConfig {
    provider: TextProviderConfig;
    imageStrategyOrder: ImageStrategyName[];
    imageStrategies: ImageStrategyConfig;
    imageTimeoutMs: number;
    layoutCount: number;
    logLevel: LogLevel;
}

export function loadEnvFile(cwd: string = process.cwd()): string | null {
    const envCandidates = [
        path.resolve(cwd, '.env'),
        path.resolve(cwd, '..', '..', '.env'),
        process.env.INIT_CWD ? path.resolve(process.env.INIT_CWD, '.env') : '',
    ].filter(Boolean);

    const envPath = envCandidates.find((candidate) => fs.existsSync(candidate));
    if (!envPath) return null;
    dotenv.config({ override: true, path: envPath });
    return envPath;
}

export function loadGeneratorConfig(env: NodeJS.ProcessEnv = process.env): GeneratorConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
        throw new ConfigError(`Invalid generator configuration: ${details}`);
    }
    const values = parsed.data;

    let provider: TextProviderConfig;
    if (values.TEXT_PROVIDER === 'gemini') {
        if (!values.GEMINI_API_KEY) throw new ConfigError('GEMINI_API_KEY is not configured');
        provider = { provider: 'gemini', apiKey: values.GEMINI_API_KEY, model: values.GEMINI_MODEL };
    } else {
        if (!values.OPENAI_API_KEY) throw new ConfigError('OPENAI_API_KEY is not configured');
        provider = {
            provider: 'openai',
            apiKey: values.OPENAI_API_KEY,
            model: values.OPENAI_MODEL,
            baseURL: values.OPENAI_BASE_URL,
        };
    }

    return {
        provider,
        imageStrategyOrder: values.IMAGE_STRATEGIES,
        imageStrategies: {
            huggingface: { apiKey: values.HUGGINGFACE_API_KEY, models: values.HUGGINGFACE_MODELS },
            openaiImage: { apiKey: values.OPENAI_API_KEY, baseURL: values.OPENAI_BASE_URL },
        },
        imageTimeoutMs: values.IMAGE_TIMEOUT_MS,
        layoutCount: values.LAYOUT_COUNT,
        logLevel: values.LOG_LEVEL,
    };
}

/** Reads `.env` (when present) and the process environment. */
export function loadGeneratorConfigFromProcess(cwd?: string): GeneratorConfig {
    loadEnvFile(cwd);
    return loadGeneratorConfig(process.env);
}

export function toLayoutGenerationOptions(
    config: GeneratorConfig,
    logger: Logger = createLogger({ level: config.logLevel }),
): LayoutGenerationOptions {
    return {
        provider: config.provider,
        layoutCount: config.layoutCount,
        imageStrategyOrder: config.imageStrategyOrder,
        imageStrategies: createImageStrategies(config.imageStrategies),
        imageTimeoutMs: config.imageTimeoutMs,
        logger,
    };
}
