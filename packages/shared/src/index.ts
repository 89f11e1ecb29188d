// ============================================================================
// Layout Studio Shared Package - Main Entry Point
// ============================================================================

// Types
export * from './types/index.js';

// Schemas
export * from './schemas/index.js';
