import type { TextProviderName } from '@layout-studio/shared';

export interface TextRequestOptions {
    signal?: AbortSignal;
}

/** One configured text model; exactly one is active per dispatcher call. */
export interface TextProvider {
    readonly name: TextProviderName;
    generate(prompt: string, options?: TextRequestOptions): Promise<string>;
}
