// ============================================================================
// Prompt Builder - Turns a PreferenceSet into model prompts
// ============================================================================

import type { PreferenceSet } from '@layout-studio/shared';

export const MAX_LAYOUTS_PER_REQUEST = 5;

export const PHOTOGRAPHIC_QUALIFIERS = [
    'professional interior photography',
    'photorealistic',
    'high quality',
    'natural lighting',
    'sharp details',
] as const;

const REMOTE_PROMPT_EXCERPT_LENGTH = 200;

function joinList(items: readonly string[]): string {
    return items.join(', ');
}

function collapseWhitespace(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}

export function clampLayoutCount(requested: number | undefined): number {
    if (requested === undefined || !Number.isFinite(requested)) return 1;
    return Math.max(1, Math.min(MAX_LAYOUTS_PER_REQUEST, Math.floor(requested)));
}

export function buildLayoutPrompt(prefs: PreferenceSet, layoutCount = 1): string {
    const count = clampLayoutCount(layoutCount);
    const single = count === 1;

    return [
        `Create ${count} detailed home layout idea${single ? '' : 's'} for a ${prefs.roomType} with the following specifications:`,
        '',
        `Style: ${prefs.style}`,
        `Budget Range: ${prefs.budget}`,
        `Space Size: ${prefs.spaceSize}`,
        `Color Preferences: ${joinList(prefs.colors)}`,
        `Special Features: ${joinList(prefs.features)}`,
        `Additional Notes: ${prefs.description}`,
        '',
        `For ${single ? 'the' : 'each'} layout, provide:`,
        '1. A descriptive title',
        '2. Detailed layout description (150-200 words)',
        '3. Key features and furniture placement',
        '4. Color scheme and materials',
        '5. Lighting suggestions',
        '6. Budget-conscious tips',
        '',
        `Format ${single ? 'the layout' : 'each layout'} as:`,
        single ? 'LAYOUT 1:' : 'LAYOUT [number]:',
        '[Detailed description]',
        '',
        `Make ${single ? 'the layout' : 'each layout'} unique and practical while staying within the specified parameters.`,
    ].join('\n');
}

export function buildImagePrompt(description: string, prefs: PreferenceSet): string {
    return [
        `Create a photorealistic interior design image of a ${prefs.roomType} with ${prefs.style} style.`,
        '',
        `Layout description: ${description}`,
        '',
        'Image requirements:',
        '- High quality, photorealistic rendering',
        `- ${prefs.style} interior design style`,
        `- ${prefs.spaceSize} space`,
        `- Color scheme incorporating ${joinList(prefs.colors)}`,
        '- Professional interior photography lighting',
        '- Clean, modern composition',
        '- Show furniture placement and room layout clearly',
    ].join('\n');
}

/**
 * Compact prompt for free text-to-image services, which take the prompt in the
 * URL or a short JSON body. The layout description is cut to a short excerpt.
 */
export function buildRemoteImagePrompt(description: string, prefs: PreferenceSet): string {
    const excerpt = collapseWhitespace(description).slice(0, REMOTE_PROMPT_EXCERPT_LENGTH).trim();
    const parts = [`${prefs.style} style ${prefs.roomType} interior design`];
    if (excerpt) parts.push(excerpt);
    if (prefs.colors.length > 0) parts.push(`color palette of ${joinList(prefs.colors)}`);
    if (prefs.features.length > 0) parts.push(`featuring ${joinList(prefs.features)}`);
    parts.push(...PHOTOGRAPHIC_QUALIFIERS);
    return parts.join(', ');
}

export function buildSearchQuery(prefs: PreferenceSet): string {
    return `${prefs.style} ${prefs.roomType} interior design`;
}
