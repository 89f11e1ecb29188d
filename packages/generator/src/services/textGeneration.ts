// ============================================================================
// Text Generation Dispatcher - Routes a prompt to the one configured provider
// ============================================================================

import { err, ok, type Result } from '@layout-studio/shared';
import { TextGenerationError, describeError } from './errors.js';
import { createGeminiProvider, type GeminiModelFactory, type GeminiProviderConfig } from './gemini.provider.js';
import { defaultLogger, type Logger } from './logger.js';
import { createOpenAIProvider, type ChatCompletionFn, type OpenAIProviderConfig } from './openai.provider.js';
import type { TextProvider } from './textProvider.js';

export type TextProviderConfig = GeminiProviderConfig | OpenAIProviderConfig;

/** Client seams; production code leaves these unset and the SDKs are used. */
export interface TextProviderClients {
    geminiModel?: GeminiModelFactory;
    chatCompletion?: ChatCompletionFn;
}

export interface GenerateTextOptions {
    signal?: AbortSignal;
    logger?: Logger;
    clients?: TextProviderClients;
}

export function createTextProvider(config: TextProviderConfig, clients: TextProviderClients = {}): TextProvider {
    switch (config.provider) {
        case 'gemini':
            return createGeminiProvider(config, clients.geminiModel);
        case 'openai':
            return createOpenAIProvider(config, clients.chatCompletion);
    }
}

export async function generateText(
    prompt: string,
    providerConfig: TextProviderConfig,
    options: GenerateTextOptions = {},
): Promise<Result<string, TextGenerationError>> {
    const logger = (options.logger ?? defaultLogger).child({ component: 'text-generation' });
    const provider = createTextProvider(providerConfig, options.clients);
    const startedAt = Date.now();

    logger.debug({ provider: provider.name, promptLength: prompt.length }, 'generate-text: start');
    try {
        const text = await provider.generate(prompt, { signal: options.signal });
        logger.info(
            { provider: provider.name, chars: text.length, durationMs: Date.now() - startedAt },
            'generate-text: complete',
        );
        return ok(text);
    } catch (error) {
        logger.warn({ provider: provider.name, reason: describeError(error) }, 'generate-text: failed');
        return err(new TextGenerationError(provider.name, error));
    }
}
