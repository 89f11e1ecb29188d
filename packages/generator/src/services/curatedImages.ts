// ============================================================================
// Curated Images - Embedded table of known-good stock photos per room/style
// ============================================================================

import { z } from 'zod';
import {
    CANONICAL_STYLES,
    CanonicalRoomTypeSchema,
    CanonicalStyleSchema,
    ok,
    type CanonicalRoomType,
    type CanonicalStyle,
    type PreferenceSet,
} from '@layout-studio/shared';
import curatedImageData from '../../data/curated-images.json' with { type: 'json' };
import type { ImageStrategy } from './imageStrategy.js';
import { DEFAULT_STYLE, normalizeRoomStyle } from './roomStyle.js';

const CuratedImageTableSchema = z.object({
    defaultImage: z.string().url(),
    rooms: z.record(
        CanonicalRoomTypeSchema,
        z.record(CanonicalStyleSchema, z.array(z.string().url()).min(1)),
    ),
});

export type CuratedImageTable = z.infer<typeof CuratedImageTableSchema>;

export interface CuratedKey {
    roomType: CanonicalRoomType;
    style: CanonicalStyle;
}

/** Picks an index into the candidate list; out-of-range values wrap. */
export type ImageSelector = (candidates: readonly string[], key: CuratedKey) => number;

export interface CuratedLookupOptions {
    table?: CuratedImageTable;
    selector?: ImageSelector;
}

function freezeTable(table: CuratedImageTable): CuratedImageTable {
    for (const styles of Object.values(table.rooms)) {
        if (!styles) continue;
        for (const urls of Object.values(styles)) {
            if (urls) Object.freeze(urls);
        }
        Object.freeze(styles);
    }
    Object.freeze(table.rooms);
    return Object.freeze(table);
}

export function parseCuratedImageTable(data: unknown): CuratedImageTable {
    return freezeTable(CuratedImageTableSchema.parse(data));
}

// Bundled with the module and validated once; read-only for the life of the process.
export const CURATED_IMAGE_TABLE: CuratedImageTable = parseCuratedImageTable(curatedImageData);

export const firstImageSelector: ImageSelector = () => 0;

/** Rotates through candidates as the clock advances by `periodMs`. */
export function createRotatingSelector(clock: () => number = Date.now, periodMs = 1000): ImageSelector {
    return (candidates) => Math.floor(clock() / Math.max(1, periodMs)) % Math.max(1, candidates.length);
}

const defaultSelector = createRotatingSelector();

function wrapIndex(index: number, length: number): number {
    if (!Number.isFinite(index)) return 0;
    const whole = Math.trunc(index);
    return ((whole % length) + length) % length;
}

function firstAvailableStyle(styles: NonNullable<CuratedImageTable['rooms'][CanonicalRoomType]>): readonly string[] | undefined {
    for (const style of CANONICAL_STYLES) {
        const urls = styles[style];
        if (urls && urls.length > 0) return urls;
    }
    return undefined;
}

export function lookupCuratedImage(key: CuratedKey, options: CuratedLookupOptions = {}): string {
    const table = options.table ?? CURATED_IMAGE_TABLE;
    const selector = options.selector ?? defaultSelector;

    const styles = table.rooms[key.roomType];
    if (!styles) return table.defaultImage;

    const candidates = styles[key.style] ?? styles[DEFAULT_STYLE] ?? firstAvailableStyle(styles);
    if (!candidates || candidates.length === 0) return table.defaultImage;

    return candidates[wrapIndex(selector(candidates, key), candidates.length)];
}

export function selectCuratedImage(
    input: Pick<PreferenceSet, 'roomType' | 'style'>,
    options: CuratedLookupOptions = {},
): string {
    return lookupCuratedImage(normalizeRoomStyle(input), options);
}

export function createCuratedStrategy(options: CuratedLookupOptions = {}): ImageStrategy {
    return {
        name: 'curated',
        async resolve({ preferences }) {
            return ok(selectCuratedImage(preferences, options));
        },
    };
}
