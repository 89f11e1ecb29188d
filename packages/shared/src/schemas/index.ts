// ============================================================================
// JSON Schema Export - For downstream exporters and response validation
// ============================================================================

import { zodToJsonSchema } from 'zod-to-json-schema';
import {
    GenerationResultSchema,
    LayoutExportDocumentSchema,
    PreferenceSetSchema,
} from '../types/index.js';

const JSON_SCHEMA_OPTIONS = {
    target: 'jsonSchema7',
    $refStrategy: 'none',
} as const;

export const preferenceSetJsonSchema = zodToJsonSchema(PreferenceSetSchema, {
    ...JSON_SCHEMA_OPTIONS,
    name: 'PreferenceSet',
});

export const generationResultJsonSchema = zodToJsonSchema(GenerationResultSchema, {
    ...JSON_SCHEMA_OPTIONS,
    name: 'GenerationResult',
});

export const layoutExportJsonSchema = zodToJsonSchema(LayoutExportDocumentSchema, {
    ...JSON_SCHEMA_OPTIONS,
    name: 'LayoutExportDocument',
});
