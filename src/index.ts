/**
 * Public API: author normalization, citation keys, records, and storage.
 */
export {
    normalizeAuthors,
    normalizeSeparators,
    simplifyName,
    surnameOf,
    joinDisplayNames,
    NAME_SUFFIXES,
    NAME_PREFIXES,
    NAME_PREPOSITIONS,
} from './names/author-normalizer.js';
export { normalizeKeywords, titleEndsWithPunctuation, quotePlus } from './names/keywords.js';
export {
    generateCiteKey,
    nextCiteKey,
    InvalidRecordStateError,
    KeyGenerationExhaustedError,
} from './citekey/citekey-generator.js';
export { PublicationRecord } from './records/publication-record.js';
export { StyleRegistry, UnknownStyleError, createDefaultRegistry, formatHarvard, formatPlain } from './styles/style-registry.js';
export type { StyleFormatter } from './styles/style-registry.js';
export { formatBibtexEntry } from './styles/bibtex.js';
export { PublicationDatabase, DuplicateCiteKeyError } from './storage/database.js';
export type { YearCount } from './storage/database.js';
export { exportLibrary, renderExport, EXPORT_FORMATS } from './exporters/export.js';
export type { ExportFormat } from './exporters/export.js';
export { resolveConfig } from './utils/config.js';
export { initLogger, getLogger } from './utils/logger.js';
export * from './types/index.js';
