/**
 * Export Services
 *
 * Renders transcript analyses for people to read.
 */

export * from './types.js';
export * from './markdownExporter.js';
