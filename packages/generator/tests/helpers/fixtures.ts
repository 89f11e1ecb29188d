import { vi } from 'vitest';
import type { PreferenceSet } from '@layout-studio/shared';
import type { FetchFn } from '../../src/services/imageStrategy.js';
import { silentLogger } from '../../src/services/logger.js';

export function makePreferences(overrides: Partial<PreferenceSet> = {}): PreferenceSet {
    return {
        roomType: 'Living Room',
        style: 'Modern',
        budget: '$1,000 - $5,000',
        spaceSize: 'Medium (100-200 sq ft)',
        colors: ['White', 'Gray'],
        features: ['Reading Nook'],
        description: 'Needs space for a piano.',
        ...overrides,
    };
}

export function imageResponse(bytes: number[] = [137, 80, 78, 71], contentType = 'image/png'): Response {
    return new Response(new Uint8Array(bytes), {
        status: 200,
        headers: { 'content-type': contentType },
    });
}

export function statusResponse(status: number, body = 'error'): Response {
    return new Response(body, { status, headers: { 'content-type': 'text/plain' } });
}

export function jsonResponse(data: unknown, status = 200): Response {
    return new Response(JSON.stringify(data), {
        status,
        headers: { 'content-type': 'application/json' },
    });
}

/** Settles only by rejecting with the signal's reason once it aborts. */
export function hangUntilAborted(init?: RequestInit): Promise<Response> {
    return new Promise<Response>((_resolve, reject) => {
        const signal = init?.signal;
        if (!signal) return;
        signal.addEventListener('abort', () => reject(signal.reason), { once: true });
    });
}

/** Never settles until the request's signal aborts. */
export function hangingFetch() {
    return vi.fn<FetchFn>((_url, init) => hangUntilAborted(init));
}

/** A response whose unread body reports cancellation through `cancel`. */
export function trackedResponse(status: number, contentType = 'text/plain') {
    const cancel = vi.fn();
    const body = new ReadableStream<Uint8Array>({ cancel });
    return { response: new Response(body, { status, headers: { 'content-type': contentType } }), cancel };
}

/** An image response whose body errors while it is being read. */
export function brokenImageResponse(reason = 'connection reset'): Response {
    const body = new ReadableStream<Uint8Array>({
        pull(controller) {
            controller.error(new Error(reason));
        },
    });
    return new Response(body, { status: 200, headers: { 'content-type': 'image/png' } });
}

export function strategyContext(
    overrides: { description?: string; preferences?: PreferenceSet; signal?: AbortSignal; timeoutMs?: number } = {},
) {
    return {
        description: overrides.description ?? 'Open plan with a corner sofa.',
        preferences: overrides.preferences ?? makePreferences(),
        signal: overrides.signal ?? new AbortController().signal,
        timeoutMs: overrides.timeoutMs ?? 60_000,
        logger: silentLogger,
    };
}
