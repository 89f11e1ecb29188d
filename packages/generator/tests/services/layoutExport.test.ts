import { describe, it, expect } from 'vitest';
import { LayoutExportDocumentSchema, type GenerationResult } from '@layout-studio/shared';
import {
    createLayoutSummary,
    exportLayoutsToJson,
    filterLayouts,
    formatLayoutForExport,
    validatePreferences,
} from '../../src/services/layoutExport.js';
import { makePreferences } from '../helpers/fixtures.js';

function makeResult(overrides: Partial<GenerationResult> = {}): GenerationResult {
    return {
        id: 'layout-1',
        title: 'Calm Corner',
        description: 'Sofa faces the window.',
        imageReference: 'https://img.test/a.png',
        sourcePreferences: makePreferences(),
        generatedAt: '2026-02-01T10:00:00.000Z',
        providerUsed: 'gemini',
        ...overrides,
    };
}

describe('validatePreferences', () => {
    it('lists every missing required field in order', () => {
        expect(validatePreferences({})).toEqual([
            'Room Type is required',
            'Style is required',
            'Budget is required',
            'Space Size is required',
        ]);
        expect(validatePreferences(null)).toHaveLength(4);
    });

    it('treats blank and non-string values as missing', () => {
        expect(validatePreferences({ roomType: 'Kitchen', style: '   ', budget: 500, spaceSize: 'Large' })).toEqual([
            'Style is required',
            'Budget is required',
        ]);
    });

    it('accepts complete preferences', () => {
        expect(validatePreferences(makePreferences())).toEqual([]);
    });
});

describe('formatLayoutForExport', () => {
    it('flattens a result into the export shape', () => {
        expect(formatLayoutForExport(makeResult({ imageReference: undefined }))).toEqual({
            id: 'layout-1',
            title: 'Calm Corner',
            description: 'Sofa faces the window.',
            preferences: makePreferences(),
            aiProvider: 'gemini',
            generatedAt: '2026-02-01T10:00:00.000Z',
            imageUrl: null,
        });
    });
});

describe('exportLayoutsToJson', () => {
    it('writes an indented document with a timestamp and count', () => {
        const json = exportLayoutsToJson([makeResult()], new Date('2026-03-01T00:00:00.000Z'));

        expect(json.startsWith('{\n  "exportTimestamp": "2026-03-01T00:00:00.000Z",\n  "totalLayouts": 1,')).toBe(true);
        const document = LayoutExportDocumentSchema.parse(JSON.parse(json));
        expect(document.layouts[0].imageUrl).toBe('https://img.test/a.png');
        expect(document.layouts[0].aiProvider).toBe('gemini');
    });

    it('exports an empty list', () => {
        expect(JSON.parse(exportLayoutsToJson([], new Date('2026-03-01T00:00:00.000Z')))).toEqual({
            exportTimestamp: '2026-03-01T00:00:00.000Z',
            totalLayouts: 0,
            layouts: [],
        });
    });
});

describe('createLayoutSummary', () => {
    it('summarizes an empty list', () => {
        expect(createLayoutSummary([])).toEqual({ total: 0, styles: [], roomTypes: [], latestGeneration: null });
    });

    it('collects unique labels and the latest timestamp', () => {
        const results = [
            makeResult({ generatedAt: '2026-02-01T10:00:00.000Z' }),
            makeResult({
                id: 'layout-2',
                sourcePreferences: makePreferences({ roomType: 'Kitchen', style: 'Rustic' }),
                generatedAt: '2026-02-03T08:30:00.000Z',
            }),
            makeResult({ id: 'layout-3', generatedAt: '2026-02-02T12:00:00.000Z' }),
        ];
        expect(createLayoutSummary(results)).toEqual({
            total: 3,
            styles: ['Modern', 'Rustic'],
            roomTypes: ['Living Room', 'Kitchen'],
            latestGeneration: '2026-02-03T08:30:00.000Z',
        });
    });
});

describe('filterLayouts', () => {
    const results = [
        makeResult({ id: 'a' }),
        makeResult({ id: 'b', sourcePreferences: makePreferences({ roomType: 'Kitchen' }) }),
        makeResult({ id: 'c', sourcePreferences: makePreferences({ style: 'Industrial', budget: 'Under $1,000' }) }),
    ];

    it('matches every given criterion', () => {
        expect(filterLayouts(results, { roomType: 'Living Room' }).map((result) => result.id)).toEqual(['a', 'c']);
        expect(filterLayouts(results, { roomType: 'Living Room', style: 'Industrial' }).map((result) => result.id)).toEqual(['c']);
        expect(filterLayouts(results, { budget: 'Under $1,000' }).map((result) => result.id)).toEqual(['c']);
    });

    it('returns everything without criteria', () => {
        expect(filterLayouts(results, {})).toHaveLength(3);
    });
});
