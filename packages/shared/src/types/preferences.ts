// ============================================================================
// Preferences - Room design preferences and the canonical room/style vocabulary
// ============================================================================

import { z } from 'zod';

// Canonical vocabulary used internally after normalization
export const CANONICAL_ROOM_TYPES = ['living', 'bedroom', 'kitchen', 'bathroom', 'office', 'dining'] as const;
export const CANONICAL_STYLES = ['modern', 'traditional', 'scandinavian', 'industrial', 'bohemian'] as const;

export const CanonicalRoomTypeSchema = z.enum(CANONICAL_ROOM_TYPES);
export const CanonicalStyleSchema = z.enum(CANONICAL_STYLES);

export type CanonicalRoomType = z.infer<typeof CanonicalRoomTypeSchema>;
export type CanonicalStyle = z.infer<typeof CanonicalStyleSchema>;

const RequiredTextSchema = z.string().refine((value) => value.trim().length > 0, {
    message: 'must not be empty',
});

// Labels are passed through as opaque strings; the UI owns their vocabulary.
export const PreferenceSetSchema = z.object({
    roomType: RequiredTextSchema.describe('UI room label, e.g. "Master Bedroom"'),
    style: RequiredTextSchema.describe('UI style label, e.g. "Mid-Century Modern"'),
    budget: RequiredTextSchema.describe('Budget range label, e.g. "$1,000 - $5,000"'),
    spaceSize: RequiredTextSchema.describe('Space size label, e.g. "Medium (100-200 sq ft)"'),
    colors: z.array(z.string()).default([]),
    features: z.array(z.string()).default([]),
    description: z.string().default(''),
});

export type PreferenceSet = z.infer<typeof PreferenceSetSchema>;
export type PreferenceSetInput = z.input<typeof PreferenceSetSchema>;

export const REQUIRED_PREFERENCE_FIELDS = ['roomType', 'style', 'budget', 'spaceSize'] as const;
export type RequiredPreferenceField = (typeof REQUIRED_PREFERENCE_FIELDS)[number];
