// ============================================================================
// Room/Style Normalization - UI labels to the canonical vocabulary
// ============================================================================

import type { CanonicalRoomType, CanonicalStyle } from '@layout-studio/shared';

export const DEFAULT_ROOM_TYPE: CanonicalRoomType = 'living';
export const DEFAULT_STYLE: CanonicalStyle = 'modern';

// Keys are lower-cased labels; canonical names map to themselves.
const ROOM_TYPE_LABELS: ReadonlyMap<string, CanonicalRoomType> = new Map<string, CanonicalRoomType>([
    ['living room', 'living'],
    ['living', 'living'],
    ['bedroom', 'bedroom'],
    ['master bedroom', 'bedroom'],
    ["children's room", 'bedroom'],
    ['guest room', 'bedroom'],
    ['kitchen', 'kitchen'],
    ['bathroom', 'bathroom'],
    ['home office', 'office'],
    ['study room', 'office'],
    ['office', 'office'],
    ['dining room', 'dining'],
    ['dining', 'dining'],
]);

const STYLE_LABELS: ReadonlyMap<string, CanonicalStyle> = new Map<string, CanonicalStyle>([
    ['modern', 'modern'],
    ['contemporary', 'modern'],
    ['mid-century modern', 'modern'],
    ['art deco', 'modern'],
    ['traditional', 'traditional'],
    ['rustic', 'traditional'],
    ['mediterranean', 'traditional'],
    ['farmhouse', 'traditional'],
    ['minimalist', 'scandinavian'],
    ['scandinavian', 'scandinavian'],
    ['industrial', 'industrial'],
    ['bohemian', 'bohemian'],
]);

function labelKey(label: string): string {
    return label
        .replace(/[‘’]/g, "'")
        .trim()
        .toLowerCase()
        .replace(/\s+/g, ' ');
}

export function normalizeRoomType(label: string): CanonicalRoomType {
    return ROOM_TYPE_LABELS.get(labelKey(label)) ?? DEFAULT_ROOM_TYPE;
}

export function normalizeStyle(label: string): CanonicalStyle {
    return STYLE_LABELS.get(labelKey(label)) ?? DEFAULT_STYLE;
}

export function normalizeRoomStyle(input: { roomType: string; style: string }): {
    roomType: CanonicalRoomType;
    style: CanonicalStyle;
} {
    return {
        roomType: normalizeRoomType(input.roomType),
        style: normalizeStyle(input.style),
    };
}
