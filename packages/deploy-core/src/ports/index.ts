/**
 * @module @pagesmith/deploy-core/ports
 * Export all port interfaces
 */

export * from './provider.js';
export * from './git.js';
export * from './generator.js';
export * from './http.js';
