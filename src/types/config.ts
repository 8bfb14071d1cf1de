/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Full bibkeys configuration merged from CLI flags, env vars, and config file.
 */
export interface BibkeysConfig {
    /** Path to the SQLite library file */
    db: string;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    /** Extra attempts when a generated key is already taken */
    keyRetries: number;

    /** Style used by `show` when none is given */
    defaultStyle: string;

    /** Domain used as referrer id in OpenURL context objects */
    siteDomain: string;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: Omit<BibkeysConfig, 'db'> = {
    logLevel: 'info',
    jsonLogs: false,
    keyRetries: 3,
    defaultStyle: 'harvard',
    siteDomain: 'localhost',
};
