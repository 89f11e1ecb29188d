import { describe, it, expect, vi } from 'vitest';
import { TextGenerationError } from '../../src/services/errors.js';
import type { GeminiModelClient, GeminiModelFactory } from '../../src/services/gemini.provider.js';
import { silentLogger } from '../../src/services/logger.js';
import { LAYOUT_SYSTEM_PROMPT, extractChatText, type ChatCompletionFn } from '../../src/services/openai.provider.js';
import { createTextProvider, generateText } from '../../src/services/textGeneration.js';

function geminiReturning(text: string | Error) {
    const generateContent = vi.fn<GeminiModelClient['generateContent']>(async () => {
        if (text instanceof Error) throw text;
        const value = text;
        return { response: { text: () => value } };
    });
    const factory = vi.fn<GeminiModelFactory>(() => ({ generateContent }));
    return { factory, generateContent };
}

function chatReturning(content: string | null, finishReason = 'stop') {
    return vi.fn<ChatCompletionFn>(async () => ({
        choices: [{ finish_reason: finishReason, message: { content } }],
    }));
}

function expectError(result: { ok: true; value: string } | { ok: false; error: TextGenerationError }): TextGenerationError {
    if (result.ok) throw new Error(`expected a failure, got "${result.value}"`);
    return result.error;
}

describe('generateText with gemini', () => {
    it('returns the trimmed model text', async () => {
        const { factory, generateContent } = geminiReturning('  LAYOUT 1: Foo  \n');
        const result = await generateText('prompt', { provider: 'gemini', apiKey: 'test-secret' }, {
            logger: silentLogger,
            clients: { geminiModel: factory },
        });

        expect(result).toEqual({ ok: true, value: 'LAYOUT 1: Foo' });
        expect(factory).toHaveBeenCalledWith({ provider: 'gemini', apiKey: 'test-secret' });
        expect(generateContent).toHaveBeenCalledWith('prompt', { signal: undefined });
    });

    it('passes the caller signal through', async () => {
        const { factory, generateContent } = geminiReturning('ok');
        const controller = new AbortController();
        await generateText('prompt', { provider: 'gemini', apiKey: 'test-secret' }, {
            signal: controller.signal,
            logger: silentLogger,
            clients: { geminiModel: factory },
        });
        expect(generateContent).toHaveBeenCalledWith('prompt', { signal: controller.signal });
    });

    it('wraps provider errors', async () => {
        const cause = new Error('quota exceeded');
        const { factory } = geminiReturning(cause);
        const error = expectError(await generateText('prompt', { provider: 'gemini', apiKey: 'test-secret' }, {
            logger: silentLogger,
            clients: { geminiModel: factory },
        }));

        expect(error).toBeInstanceOf(TextGenerationError);
        expect(error.message).toBe('Gemini generation error: quota exceeded');
        expect(error.provider).toBe('gemini');
        expect(error.cause).toBe(cause);
    });

    it('treats empty output as a failure', async () => {
        const { factory } = geminiReturning('   ');
        const error = expectError(await generateText('prompt', { provider: 'gemini', apiKey: 'test-secret' }, {
            logger: silentLogger,
            clients: { geminiModel: factory },
        }));
        expect(error.message).toBe('Gemini generation error: Gemini returned no text');
    });

    it('fails without calling the model when the key is missing', async () => {
        const { factory } = geminiReturning('unused');
        const error = expectError(await generateText('prompt', { provider: 'gemini', apiKey: '' }, {
            logger: silentLogger,
            clients: { geminiModel: factory },
        }));
        expect(error.message).toBe('Gemini generation error: GEMINI_API_KEY is not configured');
        expect(factory).not.toHaveBeenCalled();
    });
});

describe('generateText with openai', () => {
    it('sends the system and user messages with the sampling defaults', async () => {
        const chatCompletion = chatReturning(' Foo ');
        const result = await generateText('design a kitchen', { provider: 'openai', apiKey: 'test-secret' }, {
            logger: silentLogger,
            clients: { chatCompletion },
        });

        expect(result).toEqual({ ok: true, value: 'Foo' });
        expect(chatCompletion).toHaveBeenCalledWith(
            {
                model: 'gpt-4',
                messages: [
                    { role: 'system', content: LAYOUT_SYSTEM_PROMPT },
                    { role: 'user', content: 'design a kitchen' },
                ],
                max_tokens: 1500,
                temperature: 0.7,
            },
            { signal: undefined },
        );
    });

    it('honours model and sampling overrides', async () => {
        const chatCompletion = chatReturning('Foo');
        await generateText('p', { provider: 'openai', apiKey: 'test-secret', model: 'gpt-4o-mini', temperature: 0.2, maxTokens: 800 }, {
            logger: silentLogger,
            clients: { chatCompletion },
        });
        expect(chatCompletion.mock.calls[0][0]).toMatchObject({ model: 'gpt-4o-mini', temperature: 0.2, max_tokens: 800 });
    });

    it('reports empty completions with the finish reason', async () => {
        const error = expectError(await generateText('p', { provider: 'openai', apiKey: 'test-secret' }, {
            logger: silentLogger,
            clients: { chatCompletion: chatReturning(null, 'length') },
        }));
        expect(error.message).toBe('OpenAI generation error: OpenAI chat returned no text (finish_reason: length)');
        expect(error.provider).toBe('openai');
    });

    it('wraps thrown client errors', async () => {
        const chatCompletion = vi.fn<ChatCompletionFn>().mockRejectedValue(new Error('401 Incorrect API key provided'));
        const error = expectError(await generateText('p', { provider: 'openai', apiKey: 'test-secret' }, {
            logger: silentLogger,
            clients: { chatCompletion },
        }));
        expect(error.message).toBe('OpenAI generation error: 401 Incorrect API key provided');
    });

    it('fails when the key is missing', async () => {
        const chatCompletion = chatReturning('unused');
        const error = expectError(await generateText('p', { provider: 'openai', apiKey: ' ' }, {
            logger: silentLogger,
            clients: { chatCompletion },
        }));
        expect(error.message).toBe('OpenAI generation error: OPENAI_API_KEY is not configured');
        expect(chatCompletion).not.toHaveBeenCalled();
    });
});

describe('extractChatText', () => {
    it('joins text parts', () => {
        expect(extractChatText({
            choices: [{ message: { content: [{ type: 'text', text: 'Hello ' }, { type: 'image' }, { type: 'text', text: 'room' }] } }],
        })).toBe('Hello room');
    });

    it('returns an empty string without choices', () => {
        expect(extractChatText({ choices: [] })).toBe('');
    });
});

describe('createTextProvider', () => {
    it('selects the provider named by the config', () => {
        expect(createTextProvider({ provider: 'gemini', apiKey: 'test-secret' }).name).toBe('gemini');
        expect(createTextProvider({ provider: 'openai', apiKey: 'test-secret' }).name).toBe('openai');
    });
});
