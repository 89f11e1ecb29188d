export * from './preferences.js';
export * from './generation.js';
export * from './result.js';
