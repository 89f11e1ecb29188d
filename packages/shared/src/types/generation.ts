// ============================================================================
// Generation Records - Results handed to the display/export layer
// ============================================================================

import { z } from 'zod';
import { PreferenceSetSchema } from './preferences.js';

export const TextProviderNameSchema = z.enum(['gemini', 'openai']);
export type TextProviderName = z.infer<typeof TextProviderNameSchema>;

export const ImageStrategyNameSchema = z.enum(['pollinations', 'huggingface', 'lexica', 'openai-image', 'curated']);
export type ImageStrategyName = z.infer<typeof ImageStrategyNameSchema>;

export const GenerationResultSchema = z.object({
    id: z.string().describe('Unique per invocation'),
    title: z.string(),
    description: z.string(),
    imageReference: z.string().optional().describe('Remote URL or data: URL'),
    sourcePreferences: PreferenceSetSchema,
    generatedAt: z.string().datetime().describe('ISO-8601 timestamp'),
    providerUsed: TextProviderNameSchema,
});

export type GenerationResult = z.infer<typeof GenerationResultSchema>;

// Flat export shape kept compatible with previously exported files
export const ExportedLayoutSchema = z.object({
    id: z.string(),
    title: z.string(),
    description: z.string(),
    preferences: PreferenceSetSchema,
    aiProvider: TextProviderNameSchema,
    generatedAt: z.string(),
    imageUrl: z.string().nullable(),
});

export type ExportedLayout = z.infer<typeof ExportedLayoutSchema>;

export const LayoutExportDocumentSchema = z.object({
    exportTimestamp: z.string(),
    totalLayouts: z.number().int().nonnegative(),
    layouts: z.array(ExportedLayoutSchema),
});

export type LayoutExportDocument = z.infer<typeof LayoutExportDocumentSchema>;

export interface LayoutSummary {
    total: number;
    styles: string[];
    roomTypes: string[];
    latestGeneration: string | null;
}
