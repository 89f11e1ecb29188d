// ============================================================================
// Gemini Provider - Single-turn generate-from-prompt text generation
// ============================================================================

import { GoogleGenerativeAI } from '@google/generative-ai';
import type { TextProvider, TextRequestOptions } from './textProvider.js';

export const GEMINI_DEFAULT_MODEL = 'gemini-1.5-flash';

export const GEMINI_GENERATION_DEFAULTS = {
    temperature: 0.7,
    maxOutputTokens: 1500,
};

export interface GeminiProviderConfig {
    provider: 'gemini';
    apiKey: string;
    model?: string;
    temperature?: number;
    maxOutputTokens?: number;
}

export interface GeminiModelClient {
    generateContent(
        prompt: string,
        options?: { signal?: AbortSignal },
    ): Promise<{ response: { text(): string } }>;
}

export type GeminiModelFactory = (config: GeminiProviderConfig) => GeminiModelClient;

export const createGeminiModel: GeminiModelFactory = (config) => {
    const genAI = new GoogleGenerativeAI(config.apiKey);
    return genAI.getGenerativeModel({
        model: config.model || GEMINI_DEFAULT_MODEL,
        generationConfig: {
            temperature: config.temperature ?? GEMINI_GENERATION_DEFAULTS.temperature,
            maxOutputTokens: config.maxOutputTokens ?? GEMINI_GENERATION_DEFAULTS.maxOutputTokens,
        },
    });
};

function requireGeminiKey(config: GeminiProviderConfig): string {
    const apiKey = (config.apiKey || '').trim();
    if (!apiKey) throw new Error('GEMINI_API_KEY is not configured');
    return apiKey;
}

export function createGeminiProvider(
    config: GeminiProviderConfig,
    createModel: GeminiModelFactory = createGeminiModel,
): TextProvider {
    return {
        name: 'gemini',
        async generate(prompt: string, options: TextRequestOptions = {}): Promise<string> {
            const apiKey = requireGeminiKey(config);
            const model = createModel({ ...config, apiKey });
            const result = await model.generateContent(prompt, { signal: options.signal });
            const text = (result.response.text() || '').trim();
            if (!text) throw new Error('Gemini returned no text');
            return text;
        },
    };
}
