/**
 * colprint - print values side by side in aligned text columns.
 * Main library exports barrel file.
 */

// Template parsing
export * from './core/template/index.js';

// Rendering
export * from './core/render/index.js';

// Entry points
export * from './core/colprint.js';

// Configuration
export * from './core/config/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
