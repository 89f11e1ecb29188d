// ============================================================================
// Layout Studio Generator - Main Entry Point
// ============================================================================

// Pipeline
export * from './services/layoutPipeline.js';
export * from './services/layoutExport.js';

// Prompting and text generation
export * from './services/promptBuilder.js';
export * from './services/textProvider.js';
export * from './services/textGeneration.js';
export * from './services/gemini.provider.js';
export * from './services/openai.provider.js';
export * from './services/layoutParser.js';

// Images
export * from './services/roomStyle.js';
export * from './services/curatedImages.js';
export * from './services/imageStrategy.js';
export * from './services/imageCascade.js';
export * from './services/pollinations.strategy.js';
export * from './services/huggingface.strategy.js';
export * from './services/lexica.strategy.js';
export * from './services/openaiImage.strategy.js';

// Ambient
export * from './services/config.js';
export * from './services/errors.js';
export * from './services/logger.js';
