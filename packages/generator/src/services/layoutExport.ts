// ============================================================================
// Layout Export - Validation, flat export records and summaries
// ============================================================================

import {
    REQUIRED_PREFERENCE_FIELDS,
    type ExportedLayout,
    type GenerationResult,
    type LayoutExportDocument,
    type LayoutSummary,
    type PreferenceSet,
    type RequiredPreferenceField,
} from '@layout-studio/shared';

const FIELD_LABELS: Record<RequiredPreferenceField, string> = {
    roomType: 'Room Type',
    style: 'Style',
    budget: 'Budget',
    spaceSize: 'Space Size',
};

function readField(input: unknown, field: string): unknown {
    if (typeof input !== 'object' || input === null) return undefined;
    return Reflect.get(input, field);
}

function isPresent(value: unknown): boolean {
    return typeof value === 'string' && value.trim().length > 0;
}

/** Returns one message per missing required field, in field order. */
export function validatePreferences(input: unknown): string[] {
    return REQUIRED_PREFERENCE_FIELDS
        .filter((field) => !isPresent(readField(input, field)))
        .map((field) => `${FIELD_LABELS[field]} is required`);
}

export function formatLayoutForExport(result: GenerationResult): ExportedLayout {
    return {
        id: result.id,
        title: result.title,
        description: result.description,
        preferences: result.sourcePreferences,
        aiProvider: result.providerUsed,
        generatedAt: result.generatedAt,
        imageUrl: result.imageReference ?? null,
    };
}

export function buildLayoutExport(results: readonly GenerationResult[], now: Date = new Date()): LayoutExportDocument {
    return {
        exportTimestamp: now.toISOString(),
        totalLayouts: results.length,
        layouts: results.map(formatLayoutForExport),
    };
}

export function exportLayoutsToJson(results: readonly GenerationResult[], now: Date = new Date()): string {
    return JSON.stringify(buildLayoutExport(results, now), null, 2);
}

function uniqueInOrder(values: string[]): string[] {
    return [...new Set(values)];
}

export function createLayoutSummary(results: readonly GenerationResult[]): LayoutSummary {
    if (results.length === 0) {
        return { total: 0, styles: [], roomTypes: [], latestGeneration: null };
    }
    const latest = results.reduce(
        (max, result) => (result.generatedAt > max ? result.generatedAt : max),
        results[0].generatedAt,
    );
    return {
        total: results.length,
        styles: uniqueInOrder(results.map((result) => result.sourcePreferences.style)),
        roomTypes: uniqueInOrder(results.map((result) => result.sourcePreferences.roomType)),
        latestGeneration: latest,
    };
}

export type LayoutFilterCriteria = Partial<Pick<PreferenceSet, 'roomType' | 'style' | 'budget'>>;

export function filterLayouts(results: readonly GenerationResult[], criteria: LayoutFilterCriteria): GenerationResult[] {
    return results.filter((result) => {
        const prefs = result.sourcePreferences;
        if (criteria.roomType && prefs.roomType !== criteria.roomType) return false;
        if (criteria.style && prefs.style !== criteria.style) return false;
        if (criteria.budget && prefs.budget !== criteria.budget) return false;
        return true;
    });
}
