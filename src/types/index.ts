/**
 * Barrel export for all shared types.
 */
export type { Publication, PublicationInput, NormalizedAuthors, KeySibling } from './publication.js';
export { DEFAULT_CONFIG } from './config.js';
export type { BibkeysConfig, LogLevel } from './config.js';
