// ============================================================================
// OpenAI Provider - Chat completions (OpenAI or any compatible endpoint)
// ============================================================================

import OpenAI from 'openai';
import type { TextProvider, TextRequestOptions } from './textProvider.js';

export const OPENAI_DEFAULT_MODEL = 'gpt-4';

export const LAYOUT_SYSTEM_PROMPT = 'You are an expert interior designer specializing in home layout planning.';

export const OPENAI_CHAT_DEFAULTS = {
    temperature: 0.7,
    maxTokens: 1500,
};

export interface OpenAIProviderConfig {
    provider: 'openai';
    apiKey: string;
    model?: string;
    baseURL?: string;
    temperature?: number;
    maxTokens?: number;
}

type ChatMessageContent = string | null | Array<{ type: string; text?: string }>;

export interface ChatCompletionResponse {
    model?: string;
    choices: Array<{
        finish_reason?: string | null;
        message: { content: ChatMessageContent };
    }>;
}

export type ChatCompletionFn = (
    body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
    options: { signal?: AbortSignal },
) => Promise<ChatCompletionResponse>;

export function createChatCompletion(config: OpenAIProviderConfig): ChatCompletionFn {
    const client = new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseURL,
    });
    return (body, options) => client.chat.completions.create(body, options);
}

function requireOpenAIKey(config: OpenAIProviderConfig): string {
    const apiKey = (config.apiKey || '').trim();
    if (!apiKey) throw new Error('OPENAI_API_KEY is not configured');
    return apiKey;
}

export function extractChatText(data: ChatCompletionResponse): string {
    const content = data.choices[0]?.message.content;
    if (typeof content === 'string') return content.trim();
    if (Array.isArray(content)) {
        return content
            .map((part) => (typeof part.text === 'string' ? part.text : ''))
            .join('')
            .trim();
    }
    return '';
}

export function createOpenAIProvider(
    config: OpenAIProviderConfig,
    chatCompletion?: ChatCompletionFn,
): TextProvider {
    return {
        name: 'openai',
        async generate(prompt: string, options: TextRequestOptions = {}): Promise<string> {
            const apiKey = requireOpenAIKey(config);
            const complete = chatCompletion ?? createChatCompletion({ ...config, apiKey });
            const data = await complete(
                {
                    model: config.model || OPENAI_DEFAULT_MODEL,
                    messages: [
                        { role: 'system', content: LAYOUT_SYSTEM_PROMPT },
                        { role: 'user', content: prompt },
                    ],
                    max_tokens: config.maxTokens ?? OPENAI_CHAT_DEFAULTS.maxTokens,
                    temperature: config.temperature ?? OPENAI_CHAT_DEFAULTS.temperature,
                },
                { signal: options.signal },
            );

            const text = extractChatText(data);
            if (!text) {
                const finishReason = data.choices[0]?.finish_reason || 'unknown';
                throw new Error(`OpenAI chat returned no text (finish_reason: ${finishReason})`);
            }
            return text;
        },
    };
}
